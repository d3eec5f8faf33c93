/**
 * byd-hvs-client – A TypeScript library for reading telemetry from BYD
 * Battery-Box HVS / HVM / LVS home batteries over their local TCP service.
 */

// Core client
export {
  BydHvs,
  poll,
  resolveEndpoint,
  DEFAULT_HOST,
  DEFAULT_PORT,
  DEFAULT_TIMEOUT,
  MIN_POLL_INTERVAL,
} from "./bydhvs.js";

export type {
  EndpointOptions,
  PollOptions,
  PollResult,
  PollFailure,
} from "./bydhvs.js";

export { Session, describeState } from "./session.js";
export type {
  SessionState,
  SessionOptions,
  FrameChannel,
  Connector,
} from "./session.js";

export { Transport } from "./transport.js";
export type { Endpoint, ReceiveOptions } from "./transport.js";

export { nullLogger, createConsoleLogger } from "./logger.js";
export type { Logger } from "./logger.js";

// Errors
export {
  BydHvsError,
  ConnectError,
  WriteError,
  ReadError,
  TimeoutError,
  FrameError,
  ProtocolError,
  isTransient,
} from "./errors.js";
export type { FailureKind, SessionStep } from "./errors.js";

// Modbus RTU utilities
export {
  checksum,
  getCrc,
  addCrc,
  verifyCrc,
  encodeRequest,
  decodeResponse,
  readHoldingRegisters,
  writeMultipleRegisters,
} from "./modbus.js";
export type { ResponseFrame } from "./modbus.js";

export { Register, decodeErrorFlags, modelFromSerial, ERROR_FLAGS } from "./packets.js";

// Telemetry types
export type {
  TelemetrySnapshot,
  Tower,
  Module,
  Balancing,
  DeviceInfo,
  BatteryVariant,
  SerialModel,
  GridType,
  ErrorFlag,
} from "./types.js";

// Decoder utilities
export { RtuFrame, RtuFrameType, decode } from "./decoder.js";
