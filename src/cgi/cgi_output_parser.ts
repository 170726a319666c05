import { CgiOutputError } from "./errors.ts";
import type { CgiResult } from "./types.ts";

/** "Name: value" where Name is an HTTP token */
const HEADER_LINE = /^[A-Za-z0-9!#$%&'*+.^_`|~-]+:/;

const HEADER_NAME = /^[A-Za-z0-9!#$%&'*+.^_`|~-]+$/;

/** Latin-1 text without NUL, the only values a fetch Headers object takes */
const HEADER_VALUE = /^[^\u0000\r\n\u0100-\uffff]*$/;

/** Statuses that must be sent without a body */
export const NULL_BODY_STATUSES: ReadonlySet<number> = new Set([204, 205, 304]);

const HEADER_SEPARATOR = /\r?\n\r?\n/;

function parseStatus(value: string): number {
  const code = Number(value.split(" ")[0]);
  if (!Number.isInteger(code) || code < 200 || code > 599) {
    throw new CgiOutputError(`Invalid Status header: ${value}`);
  }
  return code;
}

/**
 * Split raw script output into status, headers and body.
 *
 * Output whose first line is not a header, or which has no blank line after
 * its headers, is treated as a body with no script headers.
 */
export function parseCgiOutput(raw: string): CgiResult {
  const result: CgiResult = { status: 200, headers: {}, body: raw };

  const firstLine = raw.split(/\r?\n/, 1)[0] ?? "";
  if (!HEADER_LINE.test(firstLine)) {
    return result;
  }

  const separator = HEADER_SEPARATOR.exec(raw);
  if (!separator) {
    return result;
  }

  const headerBlock = raw.slice(0, separator.index);
  result.body = raw.slice(separator.index + separator[0].length);

  for (const line of headerBlock.split(/\r?\n/)) {
    const idx = line.indexOf(":");
    if (idx === -1) {
      continue;
    }

    const name = line.slice(0, idx).trim();
    const value = line.slice(idx + 1).trim();

    if (!HEADER_NAME.test(name)) {
      throw new CgiOutputError(`Invalid header name: ${name}`);
    }
    if (!HEADER_VALUE.test(value)) {
      throw new CgiOutputError(`Invalid value for header ${name}`);
    }

    if (name.toLowerCase() === "status") {
      result.status = parseStatus(value);
    } else {
      result.headers[name] = value;
    }
  }

  return result;
}
