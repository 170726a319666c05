import { Hono } from "hono";
import type { ScriptRouter } from "../gateway/script_router.ts";
import { createScriptHeadersMiddleware } from "../middleware/security_headers.ts";
import type { ScriptRegistry } from "../scripts/registry.ts";

export interface CgiAppDeps {
  registry: ScriptRegistry;
  scriptRouter: ScriptRouter;
}

/**
 * Creates the gateway Hono app.
 *
 * Scripts are served under /scripts/*; every request to a script runs it once
 * with a fresh CGI environment built from that request.
 */
export function createCgiApp({ registry, scriptRouter }: CgiAppDeps): Hono {
  const app = new Hono();

  app.get("/ping", (c) => c.json({ pong: true }));

  app.get("/scripts", (c) =>
    c.json({
      scripts: registry.list().map((s) => ({
        name: s.name,
        description: s.description,
      })),
    })
  );

  app.use("/scripts/*", createScriptHeadersMiddleware());
  app.all("/scripts/*", (c) => scriptRouter.handle(c));

  return app;
}
