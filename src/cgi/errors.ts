/**
 * Thrown when script output cannot be interpreted as a CGI response
 */
export class CgiOutputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CgiOutputError";
  }
}
