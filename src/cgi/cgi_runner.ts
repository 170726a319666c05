import { captureEnvironment } from "../environment/snapshot.ts";
import type { EnvironmentSource } from "../environment/types.ts";
import { BufferedOutput } from "../html/output.ts";
import { ScriptExecutionError } from "../scripts/errors.ts";
import type { CgiScript } from "../scripts/types.ts";
import { logger } from "../utils/logger.ts";
import { parseCgiOutput } from "./cgi_output_parser.ts";
import type { CgiResult } from "./types.ts";

export const DEFAULT_CONTENT_TYPE = "text/html; charset=utf-8";

export interface RunScriptInput {
  /** Environment the script sees */
  env: EnvironmentSource;
  /** Request body */
  stdin?: string;
}

export interface CgiRunResult extends CgiResult {
  /** UTF-8 size of the raw script output */
  outputBytes: number;
}

/**
 * Runs scripts in process, the way a CGI server runs a script per request:
 * explicit environment in, full document out.
 */
export class CgiRunner {
  /**
   * Run a script and parse its output.
   * The document is fully built before this returns.
   *
   * @throws ScriptExecutionError when the script throws
   */
  run(script: CgiScript, input: RunScriptInput): CgiRunResult {
    const out = new BufferedOutput();
    const env = captureEnvironment(input.env);

    try {
      script.run({ env, stdin: input.stdin ?? "", out });
    } catch (error) {
      throw new ScriptExecutionError(script.name, error);
    }

    const raw = out.toString();
    const result = parseCgiOutput(raw);
    if (!Object.keys(result.headers).some((h) => h.toLowerCase() === "content-type")) {
      result.headers["Content-Type"] = DEFAULT_CONTENT_TYPE;
    }

    const outputBytes = out.byteLength;
    logger.debug(
      `Script ${script.name} finished: status=${result.status} bytes=${outputBytes} env=${env.length}`
    );

    return { ...result, outputBytes };
  }
}
