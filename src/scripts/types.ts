import type { EnvironmentSnapshot } from "../environment/types.ts";
import type { OutputWriter } from "../html/output.ts";

/**
 * Everything a script receives for one invocation.
 * The environment is passed in rather than read from process.env.
 */
export interface ScriptInvocation {
  /** Environment captured for this invocation, sorted by name */
  env: EnvironmentSnapshot;
  /** Request body, empty when the request had none */
  stdin: string;
  /** Where the response document is written */
  out: OutputWriter;
}

/**
 * A CGI-style script: a single-shot, synchronous transformation from
 * invocation to written document.
 */
export interface CgiScript {
  /** Name used to address the script, e.g. "env_dump" */
  name: string;
  /** Short human-readable summary */
  description: string;
  run(invocation: ScriptInvocation): void;
}
