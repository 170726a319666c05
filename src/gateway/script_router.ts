import type { Context } from "hono";
import { buildCgiEnvironment } from "../cgi/cgi_environment.ts";
import { CgiRunner } from "../cgi/cgi_runner.ts";
import { NULL_BODY_STATUSES } from "../cgi/cgi_output_parser.ts";
import { CgiOutputError } from "../cgi/errors.ts";
import type { EnvironmentSource } from "../environment/types.ts";
import { ScriptExecutionError } from "../scripts/errors.ts";
import type { ScriptRegistry } from "../scripts/registry.ts";
import { logger } from "../utils/logger.ts";

export interface ScriptRouterOptions {
  registry: ScriptRegistry;
  /** Value of SERVER_SOFTWARE passed to scripts */
  serverSoftware: string;
  /** Gateway environment to pass through to scripts, if any */
  inheritEnv?: EnvironmentSource;
  /** Path prefix scripts are mounted under */
  prefix?: string;
  runner?: CgiRunner;
}

/**
 * Dispatches `<prefix>/<name>[/<path-info>]` to the named script and turns
 * its output into an HTTP response.
 */
export class ScriptRouter {
  private readonly registry: ScriptRegistry;
  private readonly serverSoftware: string;
  private readonly inheritEnv: EnvironmentSource | undefined;
  private readonly prefix: string;
  private readonly runner: CgiRunner;

  constructor(options: ScriptRouterOptions) {
    this.registry = options.registry;
    this.serverSoftware = options.serverSoftware;
    this.inheritEnv = options.inheritEnv;
    this.prefix = options.prefix ?? "/scripts";
    this.runner = options.runner ?? new CgiRunner();
  }

  /**
   * Script name addressed by a request path, or "" when there is none.
   */
  resolveName(path: string): string {
    if (!path.startsWith(`${this.prefix}/`)) {
      return "";
    }
    return path.slice(this.prefix.length + 1).split("/")[0] ?? "";
  }

  async handle(c: Context): Promise<Response> {
    const name = this.resolveName(c.req.path);
    if (!name || !this.registry.has(name)) {
      return c.json({ error: "Script not found" }, 404);
    }

    const script = this.registry.get(name);
    const stdin = await c.req.text();
    const env = buildCgiEnvironment(
      {
        method: c.req.method,
        path: c.req.path,
        queryString: new URL(c.req.url).search.slice(1),
        headers: c.req.raw.headers,
      },
      script.name,
      { serverSoftware: this.serverSoftware, inherit: this.inheritEnv }
    );

    try {
      const result = this.runner.run(script, { env, stdin });
      const body = NULL_BODY_STATUSES.has(result.status) ? null : result.body;
      return new Response(body, {
        status: result.status,
        headers: result.headers,
      });
    } catch (error) {
      if (error instanceof ScriptExecutionError) {
        logger.error(`Script ${error.scriptName} failed:`, error.originalError);
        return c.json({ error: "Script execution failed" }, 500);
      }
      if (error instanceof CgiOutputError) {
        logger.error(`Script ${script.name} produced malformed output: ${error.message}`);
        return c.json({ error: "Malformed script output" }, 502);
      }
      throw error;
    }
  }
}
