import process from "node:process";
import type { Readable } from "node:stream";
import { pathToFileURL } from "node:url";
import { captureEnvironment } from "../environment/snapshot.ts";
import type { EnvironmentSource } from "../environment/types.ts";
import { BufferedOutput } from "../html/output.ts";
import { createScriptRegistry, type ScriptRegistry } from "../scripts/registry.ts";

interface TextSink {
  write(chunk: string): unknown;
}

export interface CommandIO {
  env: EnvironmentSource;
  stdin: string;
  stdout: TextSink;
  stderr: TextSink;
}

export const EXIT_OK = 0;
export const EXIT_SCRIPT_FAILED = 1;
export const EXIT_USAGE = 2;

function usage(registry: ScriptRegistry): string {
  const names = registry.list().map((s) => `  ${s.name.padEnd(14)} ${s.description}`);
  return `Usage: run_script <name>\n\nScripts:\n${names.join("\n")}\n`;
}

/**
 * Run one script the way a CGI server spawns it: environment in, raw
 * document on stdout. Returns the process exit code.
 */
export function runScriptCommand(
  argv: readonly string[],
  io: CommandIO,
  registry: ScriptRegistry = createScriptRegistry()
): number {
  const name = argv[0];
  if (!name || !registry.has(name)) {
    if (name) io.stderr.write(`Unknown script: ${name}\n`);
    io.stderr.write(usage(registry));
    return EXIT_USAGE;
  }

  const out = new BufferedOutput();
  try {
    registry.get(name).run({
      env: captureEnvironment(io.env),
      stdin: io.stdin,
      out,
    });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    io.stderr.write(`Script ${name} failed: ${message}\n`);
    return EXIT_SCRIPT_FAILED;
  }

  // Single write: nothing reaches stdout unless the whole document was built
  io.stdout.write(out.toString());
  return EXIT_OK;
}

/**
 * Declared request body length, 0 when CONTENT_LENGTH is absent or invalid.
 */
export function contentLength(env: EnvironmentSource): number {
  const length = Number(env.CONTENT_LENGTH ?? "");
  return Number.isInteger(length) && length > 0 ? length : 0;
}

/**
 * Read `length` bytes of request body, as CGI/1.1 prescribes. The stream is
 * not read past `length` bytes and is not touched at all for an empty body.
 */
export async function readRequestBody(
  input: Readable,
  length: number
): Promise<string> {
  if (length <= 0) {
    return "";
  }

  const chunks: Buffer[] = [];
  let received = 0;
  for await (const chunk of input) {
    const buf = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    chunks.push(buf);
    received += buf.length;
    if (received >= length) break;
  }
  return Buffer.concat(chunks).subarray(0, length).toString("utf8");
}

export interface ProcessIO {
  env: EnvironmentSource;
  /** Opened only when the environment declares a body */
  stdin: () => Readable;
  stdout: TextSink;
  stderr: TextSink;
}

/**
 * Entry point behind the executable: reads the declared body, then runs the
 * script. Returns the process exit code.
 */
export async function runCli(
  argv: readonly string[],
  io: ProcessIO,
  registry?: ScriptRegistry
): Promise<number> {
  const length = contentLength(io.env);
  const stdin = length > 0 ? await readRequestBody(io.stdin(), length) : "";
  return runScriptCommand(
    argv,
    { env: io.env, stdin, stdout: io.stdout, stderr: io.stderr },
    registry
  );
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  runCli(process.argv.slice(2), {
    env: process.env,
    stdin: () => process.stdin,
    stdout: process.stdout,
    stderr: process.stderr,
  }).then((code) => {
    process.exitCode = code;
  }).catch((error: unknown) => {
    console.error(error);
    process.exitCode = EXIT_SCRIPT_FAILED;
  });
}
