/**
 * Thrown when a caller breaks an operation's contract (an index out of range,
 * a traversal that cannot terminate). Raised before any node is touched.
 */
export class PreconditionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PreconditionError';
  }
}
