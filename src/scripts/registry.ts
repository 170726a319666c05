import { envDumpScript } from "./env_dump.ts";
import { largeOutputScript } from "./large_output.ts";
import { DuplicateScriptError, ScriptNotFoundError } from "./errors.ts";
import type { CgiScript } from "./types.ts";

/**
 * Scripts shipped with the gateway
 */
export const defaultScripts: readonly CgiScript[] = [
  envDumpScript,
  largeOutputScript,
];

/**
 * Name-indexed set of scripts the gateway can run.
 */
export class ScriptRegistry {
  private readonly scripts = new Map<string, CgiScript>();

  constructor(scripts: Iterable<CgiScript>) {
    for (const script of scripts) {
      if (this.scripts.has(script.name)) {
        throw new DuplicateScriptError(script.name);
      }
      this.scripts.set(script.name, script);
    }
  }

  has(name: string): boolean {
    return this.scripts.has(name);
  }

  /**
   * Look up a script by name.
   * @throws ScriptNotFoundError when nothing is registered under the name
   */
  get(name: string): CgiScript {
    const script = this.scripts.get(name);
    if (!script) {
      throw new ScriptNotFoundError(name);
    }
    return script;
  }

  /** All scripts, sorted by name */
  list(): CgiScript[] {
    return [...this.scripts.values()].sort((a, b) =>
      a.name < b.name ? -1 : a.name > b.name ? 1 : 0
    );
  }
}

export function createScriptRegistry(
  scripts: Iterable<CgiScript> = defaultScripts
): ScriptRegistry {
  return new ScriptRegistry(scripts);
}
