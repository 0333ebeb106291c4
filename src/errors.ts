/** Base class for every error raised by the framing layer. */
export class EventStreamError extends Error {
  public readonly code: string;

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "EventStreamError";
    this.code = code;
  }
}

/** Raised when a JSON Text Sequence does not open with a record separator. */
export class MissingInitialRecordSeparatorError extends EventStreamError {
  constructor() {
    super(
      "Missing an initial <RS> character, the bytes might not be a JSON Sequence.",
      "MISSING_INITIAL_RS",
    );
    this.name = "MissingInitialRecordSeparatorError";
  }
}

/** Raised when a frame payload grows past the configured `maxFrameLength`. */
export class FrameTooLargeError extends EventStreamError {
  public readonly limit: number;

  constructor(limit: number, length: number) {
    super(
      `Frame of at least ${length} bytes exceeds the configured maxFrameLength of ${limit} bytes.`,
      "FRAME_TOO_LARGE",
    );
    this.name = "FrameTooLargeError";
    this.limit = limit;
  }
}

/** Raised when a state machine is driven after it has finished. Indicates a bug in the caller. */
export class InvalidStateError extends EventStreamError {
  constructor(machine: string, operation: string) {
    super(`${machine}: ${operation} called in an invalid state.`, "INVALID_STATE");
    this.name = "InvalidStateError";
  }
}
