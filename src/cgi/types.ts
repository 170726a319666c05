/**
 * Script output split into response parts.
 */
export interface CgiResult {
  /** HTTP status, from a "Status:" header or 200 */
  status: number;
  /** Headers the script emitted, excluding "Status" */
  headers: Record<string, string>;
  body: string;
}
