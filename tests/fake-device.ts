/**
 * Scripted stand-in for the battery's TCP service.
 *
 * Parses RTU requests off each connection and answers them the way the BMU
 * does. `intercept` lets a test replace the answer to any request.
 */

import net from "node:net";
import { addCrc } from "../src/modbus.js";
import {
  bmuInfoData,
  identityData,
  readReply,
  statusData,
  towerPages,
  type BmuInfoFields,
  type StatusFields,
} from "./fixtures.js";

export type Intercept =
  | { kind: "reply"; data: Buffer }
  /** Send `data` one byte every `interval` ms */
  | { kind: "trickle"; data: Buffer; interval: number }
  | { kind: "close" }
  | { kind: "silent" };

export interface FakeDeviceOptions {
  bmu?: BmuInfoFields;
  batteryType?: number;
  status?: StatusFields;
  cellsPerModule?: number;
  temperaturesPerModule?: number;
  /** Measurement-state checks answered as still pending, per tower */
  pendingChecks?: number;
  /** Split every reply into chunks of this many bytes */
  chunkSize?: number;
  /** Called with each request and its position on the connection (from 0) */
  intercept?: (request: Buffer, index: number) => Intercept | undefined;
}

interface ConnectionState {
  tower: number;
  pages: Buffer[];
  checks: number;
  index: number;
}

export class FakeDevice {
  readonly requests: string[] = [];
  connections = 0;
  closedConnections = 0;

  private readonly server: net.Server;
  private readonly sockets = new Set<net.Socket>();
  private closeWaiters: Array<() => void> = [];

  constructor(private readonly options: FakeDeviceOptions = {}) {
    this.server = net.createServer((socket) => this.accept(socket));
  }

  async start(): Promise<number> {
    await new Promise<void>((resolve) => this.server.listen(0, "127.0.0.1", resolve));
    const address = this.server.address();
    if (address === null || typeof address === "string") {
      throw new Error("Fake device is not listening on TCP");
    }
    return address.port;
  }

  async stop(): Promise<void> {
    for (const socket of this.sockets) socket.destroy();
    await new Promise<void>((resolve) => this.server.close(() => resolve()));
  }

  /** Resolves once every accepted connection has been closed. */
  waitForDisconnect(): Promise<void> {
    if (this.connections > 0 && this.closedConnections === this.connections) {
      return Promise.resolve();
    }
    return new Promise((resolve) => this.closeWaiters.push(resolve));
  }

  private accept(socket: net.Socket): void {
    this.connections++;
    this.sockets.add(socket);
    const state: ConnectionState = { tower: 0, pages: [], checks: 0, index: 0 };
    let buffer = Buffer.alloc(0);

    socket.on("data", (chunk: Buffer) => {
      buffer = Buffer.concat([buffer, chunk]);
      for (;;) {
        const length = requestLength(buffer);
        if (length === null || buffer.length < length) return;
        const request = buffer.subarray(0, length);
        buffer = buffer.subarray(length);
        this.handle(socket, request, state);
      }
    });

    socket.on("error", () => socket.destroy());

    socket.on("close", () => {
      this.sockets.delete(socket);
      this.closedConnections++;
      if (this.closedConnections === this.connections) {
        const waiters = this.closeWaiters;
        this.closeWaiters = [];
        waiters.forEach((resolve) => resolve());
      }
    });
  }

  private handle(socket: net.Socket, request: Buffer, state: ConnectionState): void {
    this.requests.push(request.toString("hex"));
    const index = state.index++;

    const action: Intercept = this.options.intercept?.(request, index) ?? {
      kind: "reply",
      data: this.answer(request, state),
    };

    if (action.kind === "close") {
      socket.destroy();
    } else if (action.kind === "reply") {
      this.write(socket, action.data);
    } else if (action.kind === "trickle") {
      this.trickle(socket, action.data, action.interval);
    }
  }

  private answer(request: Buffer, state: ConnectionState): Buffer {
    const fc = request[1];
    const address = request.readUInt16BE(2);
    const layout = this.layout();

    if (fc === 0x10 && address === 0x0550) {
      state.tower = request.readUInt16BE(9) - 0x8100 + 1;
      state.checks = 0;
      state.pages = towerPages(
        state.tower,
        layout.cells,
        layout.temperatures
      );
      return addCrc(request.subarray(0, 6));
    }

    switch (address) {
      case 0x0000:
        return readReply(bmuInfoData(this.options.bmu));
      case 0x0010:
        return readReply(identityData(this.options.batteryType ?? 1));
      case 0x0500:
        return readReply(statusData(this.options.status));
      case 0x0551: {
        const pending = state.checks++ < (this.options.pendingChecks ?? 0);
        const value = 0x0100 + state.tower - 1 + (pending ? 0x8000 : 0);
        const data = Buffer.alloc(2);
        data.writeUInt16BE(value, 0);
        return readReply(data);
      }
      case 0x0558: {
        const page = state.pages.shift();
        return page ?? addCrc(Buffer.from([0x01, 0x83, 0x02]));
      }
      default:
        return addCrc(Buffer.from([0x01, fc | 0x80, 0x02]));
    }
  }

  private layout(): { cells: number; temperatures: number } {
    const modules = this.options.bmu?.modulesPerTower ?? 2;
    return {
      cells: modules * (this.options.cellsPerModule ?? 16),
      temperatures: modules * (this.options.temperaturesPerModule ?? 8),
    };
  }

  private trickle(socket: net.Socket, data: Buffer, interval: number): void {
    let sent = 0;
    const timer = setInterval(() => {
      if (sent >= data.length || socket.destroyed) {
        clearInterval(timer);
        return;
      }
      socket.write(data.subarray(sent, sent + 1));
      sent++;
    }, interval);
    socket.once("close", () => clearInterval(timer));
  }

  private write(socket: net.Socket, data: Buffer): void {
    const size = this.options.chunkSize;
    if (size === undefined) {
      socket.write(data);
      return;
    }
    for (let i = 0; i < data.length; i += size) {
      socket.write(data.subarray(i, i + size));
    }
  }
}

/** Length of the RTU request at the head of `buffer`, or null if not yet known. */
function requestLength(buffer: Buffer): number | null {
  if (buffer.length < 2) return null;
  if (buffer[1] === 0x10) {
    return buffer.length < 7 ? null : 9 + buffer[6];
  }
  return 8;
}
