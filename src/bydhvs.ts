/**
 * BYD Battery-Box (HVS / HVM / LVS) telemetry client.
 *
 * Each `poll()` is one self-contained cycle: a fresh connection and a fresh
 * {@link Session}, closed again whatever the outcome. Nothing but the
 * endpoint configuration survives between cycles, so independent endpoints
 * can be polled concurrently.
 */

import { BydHvsError, isTransient, type FailureKind, type SessionStep } from "./errors.js";
import { resolveLogger, type Logger } from "./logger.js";
import { Session, type SessionOptions } from "./session.js";
import type { Endpoint } from "./transport.js";
import type { TelemetrySnapshot } from "./types.js";

// ---------- Constants ----------

export const DEFAULT_HOST = "192.168.16.254";
export const DEFAULT_PORT = 8080;
export const DEFAULT_TIMEOUT = 10_000;
/** Shortest polling interval callers should schedule, in seconds */
export const MIN_POLL_INTERVAL = 10;

// ---------- Options ----------

export interface EndpointOptions {
  /** Battery IP address or host name. Default: 192.168.16.254 */
  host?: string;
  /** TCP port. Default: 8080 */
  port?: number;
  /** Timeout in milliseconds for each connect, send and receive. Default: 10000 */
  timeout?: number;
}

export interface PollOptions extends Omit<SessionOptions, "logger"> {
  /** Enable verbose/debug logging. Default: false */
  verbose?: boolean;
  /** Custom logger instance */
  logger?: Logger;
}

// ---------- Results ----------

export interface PollFailure {
  readonly kind: FailureKind;
  readonly step: SessionStep;
  readonly message: string;
  /** Timeout and ConnectError; worth retrying on the next interval */
  readonly transient: boolean;
  readonly error: BydHvsError;
}

export type PollResult =
  | { readonly ok: true; readonly snapshot: TelemetrySnapshot }
  | { readonly ok: false; readonly failure: PollFailure };

/**
 * Fill in defaults and validate an endpoint.
 *
 * @throws TypeError for an empty host, RangeError for a bad port or timeout
 */
export function resolveEndpoint(options: EndpointOptions = {}): Endpoint {
  const host = (options.host ?? DEFAULT_HOST).trim();
  const port = options.port ?? DEFAULT_PORT;
  const timeout = options.timeout ?? DEFAULT_TIMEOUT;

  if (host === "") {
    throw new TypeError("host must not be empty");
  }
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new RangeError(`port must be an integer between 1 and 65535, got ${port}`);
  }
  if (!Number.isFinite(timeout) || timeout <= 0) {
    throw new RangeError(`timeout must be a positive number of milliseconds, got ${timeout}`);
  }
  return Object.freeze({ host, port, timeout });
}

/**
 * Run one poll cycle against `endpoint`.
 *
 * Never rejects for device or network problems: those come back as
 * `{ ok: false, failure }`. Rejects only for an invalid endpoint.
 */
export async function poll(
  endpoint: EndpointOptions,
  options: PollOptions = {}
): Promise<PollResult> {
  const resolved = resolveEndpoint(endpoint);
  const log = resolveLogger(options);
  const session = new Session(resolved, { ...options, logger: log });

  try {
    const snapshot = await session.run();
    log.debug(`Poll of ${resolved.host}:${resolved.port} complete`);
    return { ok: true, snapshot };
  } catch (error) {
    // Session.run classifies everything it raises
    if (!(error instanceof BydHvsError)) throw error;
    return {
      ok: false,
      failure: {
        kind: error.kind,
        step: error.step ?? "connect",
        message: error.message,
        transient: isTransient(error.kind),
        error,
      },
    };
  }
}

// ---------- Main class ----------

/**
 * Holds one battery's endpoint and options; every `poll()` runs an
 * independent cycle.
 */
export class BydHvs {
  public readonly endpoint: Endpoint;

  constructor(
    endpoint: EndpointOptions = {},
    private readonly options: PollOptions = {}
  ) {
    this.endpoint = resolveEndpoint(endpoint);
  }

  poll(overrides: Pick<PollOptions, "signal"> = {}): Promise<PollResult> {
    return poll(this.endpoint, { ...this.options, ...overrides });
  }
}
