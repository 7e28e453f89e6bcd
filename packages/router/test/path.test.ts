import { describe, expect, it } from "vitest";
import { isValidPath, normalizePath, toBasePath } from "~/path.ts";

describe("isValidPath()", () => {
  it("should accept single segments with or without trailing slash", () => {
    expect(isValidPath("users")).toBe(true);
    expect(isValidPath("users/")).toBe(true);
    expect(isValidPath("a")).toBe(true);
    expect(isValidPath("user_profile")).toBe(true);
    expect(isValidPath("v2")).toBe(true);
  });

  it("should accept nested segments", () => {
    expect(isValidPath("users/profile")).toBe(true);
    expect(isValidPath("users/profile/")).toBe(true);
    expect(isValidPath("api/v1/users/settings")).toBe(true);
  });

  it("should reject the empty string", () => {
    expect(isValidPath("")).toBe(false);
  });

  it("should reject leading and bare slashes", () => {
    expect(isValidPath("/")).toBe(false);
    expect(isValidPath("/users")).toBe(false);
  });

  it("should reject empty segments", () => {
    expect(isValidPath("users//profile")).toBe(false);
    expect(isValidPath("users//")).toBe(false);
  });

  it("should reject characters outside word characters and slash", () => {
    expect(isValidPath("user-profile")).toBe(false);
    expect(isValidPath("user profile")).toBe(false);
    expect(isValidPath("users/:id")).toBe(false);
    expect(isValidPath("files/*")).toBe(false);
    expect(isValidPath("users.json")).toBe(false);
    expect(isValidPath("usérs")).toBe(false);
  });
});

describe("normalizePath()", () => {
  it("should append a trailing slash", () => {
    expect(normalizePath("users")).toBe("users/");
    expect(normalizePath("users/profile")).toBe("users/profile/");
  });

  it("should leave paths ending in a slash unchanged", () => {
    expect(normalizePath("users/")).toBe("users/");
  });

  it("should be idempotent", () => {
    for (const path of ["users", "users/", "a/b/c", "a/b/c/"]) {
      expect(normalizePath(normalizePath(path))).toBe(normalizePath(path));
    }
  });
});

describe("toBasePath()", () => {
  it("should root and normalize valid paths", () => {
    expect(toBasePath("api")).toBe("/api/");
    expect(toBasePath("api/")).toBe("/api/");
    expect(toBasePath("api/v1")).toBe("/api/v1/");
  });

  it("should return null for the root path", () => {
    expect(toBasePath("/")).toBeNull();
  });

  it("should return null for invalid paths", () => {
    expect(toBasePath("")).toBeNull();
    expect(toBasePath("/api")).toBeNull();
    expect(toBasePath("my-api")).toBeNull();
  });
});
