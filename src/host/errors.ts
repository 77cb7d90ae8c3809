/** Raised by the session object model when an operation is invalid for its current state. */
export class HostError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "HostError";
  }
}
