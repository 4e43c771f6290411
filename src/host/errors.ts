/**
 * Raised by host adapters when a transaction field the tracing code requires
 * is missing or malformed. It fails the hook invocation that hit it.
 */
export class HostAccessError extends Error {
  constructor(
    message: string,
    public readonly field: string,
  ) {
    super(message);
    this.name = 'HostAccessError';
  }
}
