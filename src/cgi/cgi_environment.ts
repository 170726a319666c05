import type { EnvironmentSource } from "../environment/types.ts";

/**
 * The parts of an HTTP request that become CGI meta-variables.
 */
export interface CgiRequestInfo {
  method: string;
  /** Request path without query string, e.g. "/scripts/env_dump/extra" */
  path: string;
  /** Query string without the leading "?", empty when absent */
  queryString: string;
  headers: Headers;
}

export interface CgiEnvironmentOptions {
  /** Value of SERVER_SOFTWARE */
  serverSoftware: string;
  /** Variables copied before the CGI ones (which take precedence) */
  inherit?: EnvironmentSource;
}

/** Headers that have dedicated meta-variables instead of HTTP_* ones */
const DEDICATED_HEADERS = new Set(["content-type", "content-length"]);

/**
 * Path after the first occurrence of the script name, or "" when the name
 * does not occur in the path.
 */
export function extractPathInfo(scriptName: string, path: string): string {
  const idx = path.indexOf(scriptName);
  if (idx === -1) {
    return "";
  }
  return path.slice(idx + scriptName.length);
}

/**
 * HTTP header name to its CGI meta-variable name ("X-Trace-Id" -> "HTTP_X_TRACE_ID").
 */
export function headerToMetaVariable(header: string): string {
  return `HTTP_${header.toUpperCase().replace(/-/g, "_")}`;
}

/**
 * Build the CGI/1.1 environment for running a script against a request.
 */
export function buildCgiEnvironment(
  request: CgiRequestInfo,
  scriptName: string,
  options: CgiEnvironmentOptions
): Record<string, string> {
  const env: Record<string, string> = {};

  if (options.inherit) {
    for (const [name, value] of Object.entries(options.inherit)) {
      if (value !== undefined) env[name] = value;
    }
  }

  request.headers.forEach((value, name) => {
    if (!DEDICATED_HEADERS.has(name.toLowerCase())) {
      env[headerToMetaVariable(name)] = value;
    }
  });

  env.GATEWAY_INTERFACE = "CGI/1.1";
  env.SERVER_PROTOCOL = "HTTP/1.1";
  env.SERVER_SOFTWARE = options.serverSoftware;

  env.REQUEST_METHOD = request.method.toUpperCase();
  env.REQUEST_URI = request.path;
  env.SCRIPT_NAME = scriptName;
  env.PATH_INFO = extractPathInfo(scriptName, request.path);
  env.QUERY_STRING = request.queryString;

  env.CONTENT_TYPE = request.headers.get("content-type") ?? "";
  env.CONTENT_LENGTH = request.headers.get("content-length") ?? "0";

  return env;
}
