/**
 * Failure taxonomy for a poll cycle.
 *
 * Every error raised by the transport, the frame codec or the session is one
 * of these classes. `poll()` turns them into a {@link PollFailure}.
 */

export type FailureKind =
  | "ConnectError"
  | "WriteError"
  | "ReadError"
  | "Timeout"
  | "FrameError"
  | "ProtocolError";

/** Poll cycle step an error was raised in, e.g. "handshake" or "tower 2". */
export type SessionStep =
  | "connect"
  | "handshake"
  | "identity"
  | "status"
  | `tower ${number}`;

export abstract class BydHvsError extends Error {
  abstract readonly kind: FailureKind;
  public step: SessionStep | undefined;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }

  /** Record the step this error was raised in, unless already known. */
  atStep(step: SessionStep): this {
    this.step ??= step;
    return this;
  }
}

export class ConnectError extends BydHvsError {
  readonly kind = "ConnectError";
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConnectError";
  }
}

export class WriteError extends BydHvsError {
  readonly kind = "WriteError";
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "WriteError";
  }
}

export class ReadError extends BydHvsError {
  readonly kind = "ReadError";
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ReadError";
  }
}

export class TimeoutError extends BydHvsError {
  readonly kind = "Timeout";
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TimeoutError";
  }
}

/** Length or checksum mismatch; the frame is rejected as a whole. */
export class FrameError extends BydHvsError {
  readonly kind = "FrameError";
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "FrameError";
  }
}

/** Well-formed frame with unexpected content, or an out-of-sequence reply. */
export class ProtocolError extends BydHvsError {
  readonly kind = "ProtocolError";
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ProtocolError";
  }
}

/** Timeout and ConnectError are worth retrying later; the rest are structural. */
export function isTransient(kind: FailureKind): boolean {
  return kind === "Timeout" || kind === "ConnectError";
}
