import type { IncomingMessage, ServerResponse } from "node:http";
import { configFromEnv, createLogger, Router } from "../mod.ts";

class PagesController {
  home(_req: IncomingMessage, res: ServerResponse): void {
    res.end("home");
  }
}

class AdminController {
  dashboard(_req: IncomingMessage, res: ServerResponse): void {
    res.end("dashboard");
  }

  purge(_req: IncomingMessage, res: ServerResponse): void {
    res.statusCode = 204;
    res.end();
  }
}

const pages = new PagesController();
const admin = new AdminController();
const logger = createLogger({ name: "example", level: "debug" });

const router = new Router<object, IncomingMessage, ServerResponse>({
  ...configFromEnv(),
  logger,
})
  .get("home", (req, res) => pages.home(req, res), pages)
  .on("admin")
  .use(admin)
  .get("dashboard", (req, res) => admin.dashboard(req, res))
  .delete("cache", (req, res) => admin.purge(req, res));

logger.info("Routes registered", { manifest: router.toManifest() });
