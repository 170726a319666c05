/**
 * Response headers for script output.
 *
 * Script output is untrusted and describes a single request, so responses carry:
 * - X-Content-Type-Options: nosniff - Browsers honour the declared Content-Type
 * - Referrer-Policy: no-referrer - Script pages do not leak the gateway URL
 * - Cache-Control: no-store - unless the script chose its own caching policy
 */

import type { Context, Next } from "hono";

export function createScriptHeadersMiddleware() {
  return async (c: Context, next: Next) => {
    await next();

    c.header("X-Content-Type-Options", "nosniff");
    c.header("Referrer-Policy", "no-referrer");
    if (!c.res.headers.has("Cache-Control")) {
      c.header("Cache-Control", "no-store");
    }
  };
}
