import { test } from "node:test";
import { PassThrough } from "node:stream";
import { expect } from "expect";
import {
  contentLength,
  readRequestBody,
  runCli,
  EXIT_OK,
  EXIT_SCRIPT_FAILED,
  EXIT_USAGE,
  runScriptCommand,
  type CommandIO,
} from "./run_script.ts";
import { ScriptRegistry } from "../scripts/registry.ts";
import type { CgiScript } from "../scripts/types.ts";

const echoScript: CgiScript = {
  name: "echo",
  description: "test script",
  run({ stdin, out }) {
    out.write(`[${stdin}]`);
  },
};

function captureIO(env: Record<string, string> = {}, stdin = "") {
  const stdout: string[] = [];
  const stderr: string[] = [];
  const io: CommandIO = {
    env,
    stdin,
    stdout: { write: (chunk: string) => stdout.push(chunk) },
    stderr: { write: (chunk: string) => stderr.push(chunk) },
  };
  return { io, stdout, stderr };
}

test("runScriptCommand writes the env dump in a single write", () => {
  const { io, stdout, stderr } = captureIO({ X: "<script>" });

  const code = runScriptCommand(["env_dump"], io);

  expect(code).toBe(EXIT_OK);
  expect(stderr).toEqual([]);
  expect(stdout.length).toBe(1);
  expect(stdout[0]).toContain("<tr><td>X</td><td>&lt;script&gt;</td></tr>\n");
});

test("runScriptCommand writes the large document", () => {
  const { io, stdout } = captureIO();

  expect(runScriptCommand(["large_output"], io)).toBe(EXIT_OK);
  expect(stdout[0].split("<p>Line ").length - 1).toBe(1000);
});

test("runScriptCommand prints usage without a script name", () => {
  const { io, stdout, stderr } = captureIO();

  expect(runScriptCommand([], io)).toBe(EXIT_USAGE);
  expect(stdout).toEqual([]);
  expect(stderr.join("")).toContain("Usage: run_script <name>");
});

test("runScriptCommand rejects unknown script names", () => {
  const { io, stderr } = captureIO();

  expect(runScriptCommand(["missing"], io)).toBe(EXIT_USAGE);
  expect(stderr[0]).toBe("Unknown script: missing\n");
});

test("runScriptCommand writes nothing to stdout when the script throws", () => {
  const registry = new ScriptRegistry([
    {
      name: "partial",
      description: "test script",
      run({ out }) {
        out.write("<html>");
        throw new Error("stream closed");
      },
    },
  ]);
  const { io, stdout, stderr } = captureIO();

  expect(runScriptCommand(["partial"], io, registry)).toBe(EXIT_SCRIPT_FAILED);
  expect(stdout).toEqual([]);
  expect(stderr).toEqual(["Script partial failed: stream closed\n"]);
});

test("runCli does not open stdin when no body is declared", async () => {
  const { io, stdout } = captureIO();
  let opened = false;

  const code = await runCli(["large_output"], {
    ...io,
    stdin: () => {
      opened = true;
      return new PassThrough();
    },
  });

  expect(code).toBe(EXIT_OK);
  expect(opened).toBe(false);
  expect(stdout[0].endsWith("</body></html>\n")).toBe(true);
});

test("runCli finishes while stdin stays open", async () => {
  const { io, stdout } = captureIO({ REQUEST_METHOD: "GET" });
  // Never ended, like a server that keeps the pipe open on GET requests
  const stdin = new PassThrough();

  const code = await runCli(["large_output"], { ...io, stdin: () => stdin });

  expect(code).toBe(EXIT_OK);
  expect(stdout[0].split("<p>Line ").length - 1).toBe(1000);
});

test("runCli reads exactly CONTENT_LENGTH bytes from an open stdin", async () => {
  const { io, stdout } = captureIO({ CONTENT_LENGTH: "5" });
  const stdin = new PassThrough();
  stdin.write("hello world");

  const code = await runCli(["echo"], { ...io, stdin: () => stdin }, new ScriptRegistry([echoScript]));

  expect(code).toBe(EXIT_OK);
  expect(stdout).toEqual(["[hello]"]);
});

test("readRequestBody collects a body split across chunks", async () => {
  const stdin = new PassThrough();
  stdin.write("Hello ");
  stdin.write("CGI World");

  expect(await readRequestBody(stdin, 15)).toBe("Hello CGI World");
});

test("readRequestBody returns what arrived when stdin closes early", async () => {
  const stdin = new PassThrough();
  stdin.end("abc");

  expect(await readRequestBody(stdin, 10)).toBe("abc");
});

test("contentLength ignores missing and invalid values", () => {
  expect(contentLength({})).toBe(0);
  expect(contentLength({ CONTENT_LENGTH: "" })).toBe(0);
  expect(contentLength({ CONTENT_LENGTH: "-3" })).toBe(0);
  expect(contentLength({ CONTENT_LENGTH: "abc" })).toBe(0);
  expect(contentLength({ CONTENT_LENGTH: "15" })).toBe(15);
});
