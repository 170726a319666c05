import { escapeHtml } from "../html/escape.ts";
import type { CgiScript } from "./types.ts";

const PREAMBLE = `<!DOCTYPE html>
<html>
<head>
    <title>CGI Environment Dump</title>
    <style>
        body { font-family: monospace; background: #f4f4f4; }
        table { border-collapse: collapse; width: 100%; }
        th, td { border: 1px solid #999; padding: 6px; }
        th { background: #ddd; }
        tr:nth-child(even) { background: #eee; }
    </style>
</head>
<body>
<h1>CGI Environment Variables</h1>
<table>
<tr><th>Variable</th><th>Value</th></tr>`;

const CLOSING = `</table>
</body>
</html>`;

/**
 * Renders every variable of the invocation environment as a table row.
 * Names and values are escaped independently; nothing is omitted or truncated.
 */
export const envDumpScript: CgiScript = {
  name: "env_dump",
  description: "HTML table of the CGI environment, sorted by name",

  run({ env, out }) {
    out.writeLine(PREAMBLE);
    for (const [name, value] of env) {
      out.writeLine(
        `<tr><td>${escapeHtml(name)}</td><td>${escapeHtml(value)}</td></tr>`
      );
    }
    out.writeLine(CLOSING);
  },
};
