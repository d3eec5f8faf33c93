/**
 * Poll-cycle state machine.
 *
 * A Session is single-use: it opens its own connection, walks the fixed
 * command sequence strictly one request at a time, and closes the connection
 * on every exit path. Replies carry no request id, so nothing is pipelined.
 *
 *   Disconnected → Handshaking → QueryingIdentity → QueryingStatus
 *     → QueryingTowerData(1..N) → Complete
 *
 * Any failure moves to Failed(kind) and rejects with the classified error.
 */

import { setTimeout as sleep } from "node:timers/promises";
import {
  BydHvsError,
  ProtocolError,
  TimeoutError,
  type FailureKind,
  type SessionStep,
} from "./errors.js";
import { nullLogger, type Logger } from "./logger.js";
import {
  decodeResponse,
  expectedResponseLength,
  type ResponseFrame,
} from "./modbus.js";
import {
  MEASUREMENT_PENDING,
  decodeBmuInfo,
  decodeIdentity,
  decodeStatus,
  requests,
  type BmuInfo,
  type Identity,
  type PackStatus,
} from "./packets.js";
import { TowerDataAssembler, assertContiguous } from "./tower.js";
import { Transport, type Endpoint, type ReceiveOptions } from "./transport.js";
import type { TelemetrySnapshot, Tower } from "./types.js";

export type SessionState =
  | { readonly name: "Disconnected" }
  | { readonly name: "Handshaking" }
  | { readonly name: "QueryingIdentity" }
  | { readonly name: "QueryingStatus" }
  | { readonly name: "QueryingTowerData"; readonly tower: number }
  | { readonly name: "Complete" }
  | { readonly name: "Failed"; readonly kind: FailureKind };

/** The part of a connection the session drives. */
export interface FrameChannel {
  send(frame: Buffer): Promise<void>;
  receive(expected: number, options?: ReceiveOptions): Promise<Buffer>;
  close(): void;
}

export type Connector = (
  endpoint: Endpoint,
  logger: Logger,
  signal?: AbortSignal
) => Promise<FrameChannel>;

export interface SessionOptions {
  /** Modbus slave id of the BMU. Default: 1 */
  slaveId?: number;
  /** Silence (ms) after a partial reply before it is handed to the decoder. Default: 500 */
  idleTimeout?: number;
  /** Wait (ms) before each measurement-state check. Default: 3000 */
  measurementDelay?: number;
  /** Measurement-state checks per tower before giving up. Default: 10 */
  measurementAttempts?: number;
  /** Cancels the cycle; the connection is closed at once. */
  signal?: AbortSignal;
  logger?: Logger;
  /** Called on every state transition. Errors it throws are logged and ignored. */
  onStateChange?: (state: SessionState) => void;
  /** Opens the connection. Default: a TCP {@link Transport} */
  connect?: Connector;
}

export class Session {
  private current: SessionState = { name: "Disconnected" };
  private step: SessionStep = "connect";
  private channel: FrameChannel | null = null;

  private readonly slaveId: number;
  private readonly idleTimeout: number;
  private readonly measurementDelay: number;
  private readonly measurementAttempts: number;
  private readonly log: Logger;
  private readonly connector: Connector;

  constructor(
    public readonly endpoint: Endpoint,
    private readonly options: SessionOptions = {}
  ) {
    this.slaveId = options.slaveId ?? 1;
    this.idleTimeout = options.idleTimeout ?? 500;
    this.measurementDelay = options.measurementDelay ?? 3000;
    this.measurementAttempts = options.measurementAttempts ?? 10;
    this.log = options.logger ?? nullLogger;
    this.connector = options.connect ?? Transport.connect;
  }

  get state(): SessionState {
    return this.current;
  }

  /** Run the whole cycle; resolves with a complete snapshot or rejects with a BydHvsError. */
  async run(): Promise<TelemetrySnapshot> {
    if (this.current.name !== "Disconnected") {
      throw new ProtocolError("Session already used; create one per poll cycle");
    }

    const { signal } = this.options;
    const onAbort = () => this.channel?.close();
    signal?.addEventListener("abort", onAbort, { once: true });

    try {
      this.throwIfAborted();
      this.channel = await this.connector(this.endpoint, this.log, signal);
      this.throwIfAborted();

      this.enter({ name: "Handshaking" }, "handshake");
      const bmu = decodeBmuInfo((await this.exchange(requests.bmuInfo(this.slaveId))).raw);
      this.log.debug(
        `BMU ${bmu.serial}: ${bmu.towers} towers x ${bmu.modulesPerTower} modules`
      );

      this.enter({ name: "QueryingIdentity" }, "identity");
      const identity = decodeIdentity(
        (await this.exchange(requests.identity(this.slaveId))).raw
      );

      this.enter({ name: "QueryingStatus" }, "status");
      const status = decodeStatus((await this.exchange(requests.status(this.slaveId))).raw);

      const towers: Tower[] = [];
      for (let tower = 1; tower <= bmu.towers; tower++) {
        this.enter({ name: "QueryingTowerData", tower }, `tower ${tower}`);
        towers.push(await this.queryTower(tower, bmu, identity));
      }
      assertContiguous(towers);

      const snapshot = buildSnapshot(bmu, identity, status, towers);
      this.enter({ name: "Complete" }, this.step);
      return snapshot;
    } catch (err) {
      const failure = this.classify(err);
      this.log.debug(`Poll failed at ${this.step}: ${failure.kind}: ${failure.message}`);
      this.enter({ name: "Failed", kind: failure.kind }, this.step);
      throw failure;
    } finally {
      signal?.removeEventListener("abort", onAbort);
      this.channel?.close();
    }
  }

  private async queryTower(
    tower: number,
    bmu: BmuInfo,
    identity: Identity
  ): Promise<Tower> {
    await this.exchange(requests.startMeasurement(this.slaveId, tower));
    await this.awaitMeasurement(tower);

    const assembler = new TowerDataAssembler(tower, {
      modules: bmu.modulesPerTower,
      cellsPerModule: identity.cellsPerModule,
      temperaturesPerModule: identity.temperaturesPerModule,
    });
    while (!assembler.complete) {
      assembler.accept((await this.exchange(requests.cellData(this.slaveId))).raw);
    }
    this.log.debug(`Tower ${tower}: ${assembler.pages} pages`);
    return assembler.finish();
  }

  private async awaitMeasurement(tower: number): Promise<void> {
    for (let attempt = 1; attempt <= this.measurementAttempts; attempt++) {
      await sleep(this.measurementDelay, undefined, { signal: this.options.signal });
      const reply = await this.exchange(requests.measurementState(this.slaveId));
      if ((reply.registers[0] & MEASUREMENT_PENDING) === 0) {
        return;
      }
      this.log.debug(`Tower ${tower}: measurement pending (check ${attempt})`);
    }
    throw new TimeoutError(
      `Tower ${tower} measurement not ready after ${this.measurementAttempts} checks`
    );
  }

  private async exchange(request: Buffer): Promise<ResponseFrame> {
    const channel = this.channel;
    if (channel === null) {
      throw new ProtocolError("No connection");
    }
    await channel.send(request);
    const reply = await channel.receive(expectedResponseLength(request), {
      idleTimeout: this.idleTimeout,
    });
    return decodeResponse(reply, request);
  }

  private enter(state: SessionState, step: SessionStep): void {
    this.current = state;
    this.step = step;
    this.log.debug(`State: ${describeState(state)}`);
    // A throwing hook must not change the outcome of the cycle
    try {
      this.options.onStateChange?.(state);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.log.warn(`onStateChange failed in ${describeState(state)}: ${message}`);
    }
  }

  private throwIfAborted(): void {
    if (this.options.signal?.aborted) {
      throw new TimeoutError("poll cancelled");
    }
  }

  private classify(err: unknown): BydHvsError {
    if (this.options.signal?.aborted && !(err instanceof TimeoutError)) {
      return new TimeoutError("poll cancelled", { cause: err }).atStep(this.step);
    }
    if (err instanceof BydHvsError) {
      return err.atStep(this.step);
    }
    const message = err instanceof Error ? err.message : String(err);
    return new ProtocolError(`Unexpected failure: ${message}`, { cause: err }).atStep(
      this.step
    );
  }
}

export function describeState(state: SessionState): string {
  switch (state.name) {
    case "QueryingTowerData":
      return `QueryingTowerData(${state.tower})`;
    case "Failed":
      return `Failed(${state.kind})`;
    default:
      return state.name;
  }
}

function buildSnapshot(
  bmu: BmuInfo,
  identity: Identity,
  status: PackStatus,
  towers: Tower[]
): TelemetrySnapshot {
  return {
    device: {
      serial: bmu.serial,
      modelFromSerial: bmu.modelFromSerial,
      bmuFirmwareA: bmu.bmuFirmwareA,
      bmuFirmwareB: bmu.bmuFirmwareB,
      bmsFirmware: bmu.bmsFirmware,
      activeBmu: bmu.activeBmu,
      grid: bmu.grid,
      inverterType: identity.inverterType,
      batteryType: identity.batteryType,
      variant: identity.variant,
      towers: bmu.towers,
      modulesPerTower: bmu.modulesPerTower,
      cellsPerModule: identity.cellsPerModule,
      temperaturesPerModule: identity.temperaturesPerModule,
      totalCells: bmu.towers * bmu.modulesPerTower * identity.cellsPerModule,
      totalTemperatures: bmu.towers * bmu.modulesPerTower * identity.temperaturesPerModule,
    },
    soc: status.soc,
    soh: status.soh,
    voltage: status.voltage,
    outputVoltage: status.outputVoltage,
    current: status.current,
    power: status.power,
    maxCellVoltage: status.maxCellVoltage,
    minCellVoltage: status.minCellVoltage,
    voltageDifference: status.voltageDifference,
    maxTemperature: status.maxTemperature,
    minTemperature: status.minTemperature,
    batteryTemperature: status.batteryTemperature,
    paramT: status.paramT,
    errorNumber: status.errorNumber,
    errorFlags: status.errorFlags,
    eta: status.eta,
    diagnosticCounters: {
      chargeTotal: status.chargeTotal,
      dischargeTotal: status.dischargeTotal,
    },
    towers,
  };
}
