import type { CgiScript } from "./types.ts";

export const LARGE_OUTPUT_LINE_COUNT = 1000;

export function largeOutputLine(index: number): string {
  return `<p>Line ${index}: This is a large CGI response test.</p>`;
}

/**
 * Fixed, input-independent document for exercising large responses.
 */
export const largeOutputScript: CgiScript = {
  name: "large_output",
  description: `${LARGE_OUTPUT_LINE_COUNT} generated paragraphs for response-size testing`,

  run({ out }) {
    out.writeLine("<!DOCTYPE html>");
    out.writeLine("<html><body>");
    out.writeLine("<h1>Huge CGI Response</h1>");
    for (let i = 0; i < LARGE_OUTPUT_LINE_COUNT; i++) {
      out.writeLine(largeOutputLine(i));
    }
    out.writeLine("</body></html>");
  },
};
