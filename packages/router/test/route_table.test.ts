import { describe, expect, it } from "vitest";
import { RouteEntry, RouteTable } from "~/route_table.ts";

interface Controller {
  name: string;
}

const users: Controller = { name: "users" };
const admin: Controller = { name: "admin" };
const noop = () => undefined;

describe("RouteEntry", () => {
  it("should keep path, controller and action", () => {
    const entry = new RouteEntry("users/", users, noop);

    expect(entry.path).toBe("users/");
    expect(entry.controller).toBe(users);
    expect(entry.action).toBe(noop);
  });

  it("should be frozen", () => {
    const entry = new RouteEntry("users/", users, noop);

    expect(Object.isFrozen(entry)).toBe(true);
  });
});

describe("RouteTable", () => {
  it("should start empty", () => {
    const table = new RouteTable<Controller>();

    expect(table.size).toBe(0);
    expect(table.entries()).toEqual([]);
    expect(table.at(0)).toBeUndefined();
  });

  it("should keep registration order", () => {
    const table = new RouteTable<Controller>();
    const first = new RouteEntry("b/", users, noop);
    const second = new RouteEntry("a/", users, noop);

    table.add(first);
    table.add(second);

    expect(table.size).toBe(2);
    expect(table.at(0)).toBe(first);
    expect(table.at(1)).toBe(second);
    expect(table.at(-1)).toBe(second);
    expect([...table]).toEqual([first, second]);
  });

  it("should keep duplicate paths", () => {
    const table = new RouteTable<Controller>();
    const first = new RouteEntry("users/", users, noop);
    const second = new RouteEntry("users/", admin, noop);

    table.add(first);
    table.add(second);

    expect(table.entries()).toEqual([first, second]);
  });

  it("should return a snapshot from entries()", () => {
    const table = new RouteTable<Controller>();
    table.add(new RouteEntry("a/", users, noop));

    const snapshot = table.entries();
    table.add(new RouteEntry("b/", users, noop));

    expect(snapshot.length).toBe(1);
    expect(table.size).toBe(2);
  });

  it("should filter entries by controller identity", () => {
    const table = new RouteTable<Controller>();
    const usersEntry = new RouteEntry("a/", users, noop);
    const adminEntry = new RouteEntry("b/", admin, noop);
    const lookalike = new RouteEntry("c/", { name: "users" }, noop);
    table.add(usersEntry);
    table.add(adminEntry);
    table.add(lookalike);

    expect(table.forController(users)).toEqual([usersEntry]);
    expect(table.forController(admin)).toEqual([adminEntry]);
  });

  describe("asReadonly()", () => {
    it("should expose no way to add entries", () => {
      const view = new RouteTable<Controller>().asReadonly();

      expect(Reflect.has(view, "add")).toBe(false);
      expect(Reflect.get(view, "add")).toBeUndefined();
      expect(Object.isFrozen(view)).toBe(true);
    });

    it("should follow the table as it grows", () => {
      const table = new RouteTable<Controller>();
      const view = table.asReadonly();
      const usersEntry = new RouteEntry("a/", users, noop);
      const adminEntry = new RouteEntry("b/", admin, noop);

      table.add(usersEntry);
      table.add(adminEntry);

      expect(view.size).toBe(2);
      expect(view.at(1)).toBe(adminEntry);
      expect(view.entries()).toEqual([usersEntry, adminEntry]);
      expect(view.forController(admin)).toEqual([adminEntry]);
      expect([...view]).toEqual([usersEntry, adminEntry]);
    });

    it("should return the same view every time", () => {
      const table = new RouteTable<Controller>();

      expect(table.asReadonly()).toBe(table.asReadonly());
    });
  });
});
