/**
 * One TCP connection to the battery's service.
 *
 * Incoming bytes are buffered as they arrive; `receive` assembles them into
 * a reply, which the device may deliver in several chunks.
 */

import net from "node:net";
import {
  ConnectError,
  ReadError,
  TimeoutError,
  WriteError,
} from "./errors.js";
import { nullLogger, type Logger } from "./logger.js";

export interface Endpoint {
  readonly host: string;
  readonly port: number;
  /** Timeout in milliseconds for connect, each send and each receive */
  readonly timeout: number;
}

export interface ReceiveOptions {
  /** Overall deadline in milliseconds. Default: the endpoint timeout */
  timeout?: number;
  /**
   * Once some bytes arrived, return them after this many milliseconds of
   * silence even if fewer than expected. Default: 500
   */
  idleTimeout?: number;
}

interface PendingRead {
  expected: number;
  resolve: (data: Buffer) => void;
  reject: (err: Error) => void;
}

export class Transport {
  private buffer: Buffer = Buffer.alloc(0);
  private pending: PendingRead | null = null;
  private closedReason: Error | null = null;
  private closed = false;

  private constructor(
    private readonly socket: net.Socket,
    public readonly endpoint: Endpoint,
    private readonly log: Logger
  ) {
    socket.on("data", (data: Buffer) => {
      this.log.debug(`RECD: ${data.toString("hex")}`);
      this.buffer = Buffer.concat([this.buffer, data]);
      if (this.pending && this.buffer.length >= this.pending.expected) {
        this.pending.resolve(this.take());
      }
    });

    socket.on("error", (err: Error) => {
      this.log.debug(`Socket error: ${err.message}`);
      this.fail(new ReadError(`Socket error: ${err.message}`, { cause: err }));
    });

    socket.on("close", () => {
      this.log.debug("Socket closed");
      this.fail(
        new ReadError(
          `Connection closed by ${endpoint.host}:${endpoint.port} after ${this.buffer.length} bytes`
        )
      );
    });
  }

  /**
   * Open a connection, failing with ConnectError or TimeoutError. An abort
   * of `signal` destroys the pending socket and fails with TimeoutError.
   */
  static connect(
    endpoint: Endpoint,
    logger: Logger = nullLogger,
    signal?: AbortSignal
  ): Promise<Transport> {
    return new Promise<Transport>((resolve, reject) => {
      if (signal?.aborted) {
        reject(new TimeoutError("poll cancelled"));
        return;
      }
      const socket = new net.Socket();

      const timer = setTimeout(() => {
        cleanup();
        socket.destroy();
        reject(
          new TimeoutError(
            `Connect to ${endpoint.host}:${endpoint.port} timed out after ${endpoint.timeout} ms`
          )
        );
      }, endpoint.timeout);

      const onError = (err: Error) => {
        cleanup();
        socket.destroy();
        reject(
          new ConnectError(
            `Cannot open connection to ${endpoint.host}:${endpoint.port}: ${err.message}`,
            { cause: err }
          )
        );
      };

      const onConnect = () => {
        cleanup();
        logger.debug(`Connected to ${endpoint.host}:${endpoint.port}`);
        resolve(new Transport(socket, endpoint, logger));
      };

      const onAbort = () => {
        cleanup();
        socket.destroy();
        reject(new TimeoutError("poll cancelled"));
      };

      const cleanup = () => {
        clearTimeout(timer);
        socket.removeListener("error", onError);
        socket.removeListener("connect", onConnect);
        signal?.removeEventListener("abort", onAbort);
      };

      signal?.addEventListener("abort", onAbort, { once: true });
      socket.once("error", onError);
      socket.once("connect", onConnect);
      socket.connect(endpoint.port, endpoint.host);
    });
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Write all bytes, failing with WriteError or TimeoutError. */
  send(frame: Buffer): Promise<void> {
    if (this.closed || this.socket.destroyed) {
      return Promise.reject(new WriteError("Connection already closed."));
    }
    this.log.debug(`SENT: ${frame.toString("hex")}`);

    return new Promise<void>((resolve, reject) => {
      const timer = setTimeout(() => {
        reject(
          new TimeoutError(`Send timed out after ${this.endpoint.timeout} ms`)
        );
      }, this.endpoint.timeout);

      this.socket.write(frame, (err) => {
        clearTimeout(timer);
        if (err) {
          reject(new WriteError(`Write failed: ${err.message}`, { cause: err }));
        } else {
          resolve();
        }
      });
    });
  }

  /**
   * Receive at least `expected` bytes.
   *
   * Resolves with everything buffered once `expected` bytes are in, or with
   * the partial data after `idleTimeout` of silence. Rejects with
   * TimeoutError when the deadline passes first, even if some bytes came in,
   * and with ReadError if the connection closes.
   */
  receive(expected: number, options: ReceiveOptions = {}): Promise<Buffer> {
    if (this.pending) {
      return Promise.reject(new ReadError("A receive is already in progress"));
    }
    if (this.buffer.length >= expected) {
      return Promise.resolve(this.take());
    }
    if (this.closedReason) {
      return Promise.reject(this.closedReason);
    }

    const timeout = options.timeout ?? this.endpoint.timeout;
    const idleTimeout = options.idleTimeout ?? 500;

    return new Promise<Buffer>((resolve, reject) => {
      let idleTimer: NodeJS.Timeout | null = null;
      let received = this.buffer.length;

      const settle = () => {
        clearTimeout(deadline);
        if (idleTimer) clearTimeout(idleTimer);
        this.socket.removeListener("data", onData);
        this.pending = null;
      };

      const armIdle = () => {
        if (idleTimer) clearTimeout(idleTimer);
        idleTimer = setTimeout(() => {
          settle();
          resolve(this.take());
        }, idleTimeout);
      };

      const onData = () => {
        // Still short of `expected`, otherwise the data handler resolved us
        if (this.pending && this.buffer.length > received) {
          received = this.buffer.length;
          armIdle();
        }
      };

      // Partial replies are handed back by the idle timer only
      const deadline = setTimeout(() => {
        settle();
        reject(
          new TimeoutError(
            `No complete reply within ${timeout} ms (${this.buffer.length} of ${expected} bytes)`
          )
        );
      }, timeout);

      this.pending = {
        expected,
        resolve: (data) => {
          settle();
          resolve(data);
        },
        reject: (err) => {
          settle();
          reject(err);
        },
      };

      this.socket.on("data", onData);
      if (received > 0) armIdle();
    });
  }

  /** Destroy the socket. Safe to call any number of times. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.fail(new ReadError("Connection closed locally"));
    this.socket.destroy();
    this.log.debug(`Disconnected from ${this.endpoint.host}:${this.endpoint.port}`);
  }

  private take(): Buffer {
    const data = this.buffer;
    this.buffer = Buffer.alloc(0);
    return data;
  }

  private fail(err: Error): void {
    this.closedReason ??= err;
    if (this.pending) {
      this.pending.reject(err);
    }
  }
}
