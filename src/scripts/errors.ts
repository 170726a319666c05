/**
 * Base error class for script-related errors
 */
export class ScriptError extends Error {
  constructor(
    message: string,
    public readonly scriptName: string
  ) {
    super(message);
    this.name = "ScriptError";
  }
}

/**
 * Thrown when no script is registered under the requested name
 */
export class ScriptNotFoundError extends ScriptError {
  constructor(scriptName: string) {
    super(`Script not found: ${scriptName}`, scriptName);
    this.name = "ScriptNotFoundError";
  }
}

/**
 * Thrown when two scripts are registered under the same name
 */
export class DuplicateScriptError extends ScriptError {
  constructor(scriptName: string) {
    super(`Script registered more than once: ${scriptName}`, scriptName);
    this.name = "DuplicateScriptError";
  }
}

/**
 * Thrown when the script throws an error during execution
 */
export class ScriptExecutionError extends ScriptError {
  public readonly originalError: unknown;

  constructor(scriptName: string, originalError: unknown) {
    super(`Script execution failed: ${scriptName}`, scriptName);
    this.name = "ScriptExecutionError";
    this.originalError = originalError;
  }
}
