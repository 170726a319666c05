import "dotenv/config";
import process from "node:process";
import { pathToFileURL } from "node:url";
import { serve } from "@hono/node-server";
import { createCgiApp } from "./src/apps/cgi_app.ts";
import { loadConfig } from "./src/config/config.ts";
import { ScriptRouter } from "./src/gateway/script_router.ts";
import { createScriptRegistry } from "./src/scripts/registry.ts";
import { logger, setLogLevel } from "./src/utils/logger.ts";

const config = loadConfig(process.env);
setLogLevel(config.logLevel);

// Initialize script registry and router
const registry = createScriptRegistry();
const scriptRouter = new ScriptRouter({
  registry,
  serverSoftware: config.serverSoftware,
  inheritEnv: config.inheritEnv ? process.env : undefined,
});

const app = createCgiApp({ registry, scriptRouter });

// Export app and services for testing
export { app, config, registry, scriptRouter };

// Start server only when run directly
if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  serve({ fetch: app.fetch, port: config.port, hostname: config.host }, (info) => {
    logger.info(
      `Serving ${registry.list().length} scripts on http://${info.address}:${info.port}/scripts`
    );
  });
}
