/**
 * Modbus RTU frame construction and parsing.
 *
 * The battery's TCP service speaks plain Modbus RTU framing over the socket
 * (no MBAP header). Only the two function codes the BMU answers are built:
 *   - FC 3  read holding registers
 *   - FC 16 write multiple registers
 */

import { FrameError, ProtocolError } from "./errors.js";

export const FC_READ_HOLDING_REGISTERS = 0x03;
export const FC_WRITE_MULTIPLE_REGISTERS = 0x10;

const EXCEPTION_FLAG = 0x80;
const WRITE_RESPONSE_LENGTH = 8;
const MIN_RESPONSE_LENGTH = 5;

// ---------- CRC-16/Modbus lookup table ----------

const CRC_TABLE = new Uint16Array(256);
for (let i = 0; i < 256; i++) {
  let crc = i;
  for (let j = 0; j < 8; j++) {
    crc = crc & 1 ? (crc >>> 1) ^ 0xa001 : crc >>> 1;
  }
  CRC_TABLE[i] = crc;
}

/** Calculate CRC-16/Modbus over the given bytes. */
export function checksum(data: Uint8Array): number {
  let crc = 0xffff;
  for (let i = 0; i < data.length; i++) {
    crc = (crc >>> 8) ^ CRC_TABLE[(crc ^ data[i]) & 0xff];
  }
  return crc;
}

/** Return a 2-byte little-endian Buffer containing the CRC. */
export function getCrc(data: Uint8Array): Buffer {
  const buf = Buffer.alloc(2);
  buf.writeUInt16LE(checksum(data), 0);
  return buf;
}

/** Append CRC-16 to the given data and return the new buffer. */
export function addCrc(data: Buffer): Buffer {
  return Buffer.concat([data, getCrc(data)]);
}

/** Verify CRC on a Modbus RTU frame. Returns true if valid. */
export function verifyCrc(frame: Buffer): boolean {
  if (frame.length < 4) return false;
  return checksum(frame.subarray(0, frame.length - 2)) === frame.readUInt16LE(frame.length - 2);
}

// ---------- Modbus exception mapping ----------

export const MODBUS_EXCEPTION_NAMES: Record<number, string> = {
  1: "IllegalFunction",
  2: "IllegalDataAddress",
  3: "IllegalDataValue",
  4: "ServerDeviceFailure",
  5: "Acknowledge",
  6: "ServerDeviceBusy",
};

// ---------- Request frame builders ----------

/**
 * Build a request frame: slave address, function code, payload and CRC.
 */
export function encodeRequest(
  slaveId: number,
  functionCode: number,
  payload: Buffer
): Buffer {
  const pdu = Buffer.alloc(2 + payload.length);
  pdu[0] = slaveId;
  pdu[1] = functionCode;
  payload.copy(pdu, 2);
  return addCrc(pdu);
}

/** FC 3 – Read Holding Registers */
export function readHoldingRegisters(
  slaveId: number,
  startAddr: number,
  quantity: number
): Buffer {
  const data = Buffer.alloc(4);
  data.writeUInt16BE(startAddr, 0);
  data.writeUInt16BE(quantity, 2);
  return encodeRequest(slaveId, FC_READ_HOLDING_REGISTERS, data);
}

/** FC 16 – Write Multiple Registers */
export function writeMultipleRegisters(
  slaveId: number,
  startAddr: number,
  values: readonly number[]
): Buffer {
  const quantity = values.length;
  const byteCount = quantity * 2;
  const data = Buffer.alloc(5 + byteCount);
  data.writeUInt16BE(startAddr, 0);
  data.writeUInt16BE(quantity, 2);
  data[4] = byteCount;
  for (let i = 0; i < quantity; i++) {
    data.writeUInt16BE(values[i], 5 + i * 2);
  }
  return encodeRequest(slaveId, FC_WRITE_MULTIPLE_REGISTERS, data);
}

/** Byte length of a complete, non-exception reply to `request`. */
export function expectedResponseLength(request: Buffer): number {
  if (request[1] === FC_READ_HOLDING_REGISTERS) {
    return MIN_RESPONSE_LENGTH + request.readUInt16BE(4) * 2;
  }
  return WRITE_RESPONSE_LENGTH;
}

// ---------- Response ADU parsing ----------

export interface ResponseFrame {
  /** The complete frame as received, CRC included */
  readonly raw: Buffer;
  readonly functionCode: number;
  /** Byte count for read replies; 4 (address + quantity) for write echoes */
  readonly declaredLength: number;
  readonly checksum: number;
  /** Register values for reads; `[address, quantity]` for write echoes */
  readonly registers: readonly number[];
}

/**
 * Validate and parse a Modbus RTU response to `request`.
 *
 * Length and CRC are checked before any content is looked at. A frame that
 * fails any check is rejected whole: FrameError for length/CRC mismatches,
 * ProtocolError for a well-formed frame that does not answer `request`.
 */
export function decodeResponse(response: Buffer, request: Buffer): ResponseFrame {
  if (response.length < MIN_RESPONSE_LENGTH) {
    throw new FrameError(
      `Response too short: ${response.length} bytes (${response.toString("hex")})`
    );
  }

  const requestFc = request[1];
  const responseFc = response[1];

  if (responseFc === (requestFc | EXCEPTION_FLAG)) {
    const frame = checkedFrame(response, MIN_RESPONSE_LENGTH);
    const code = frame[2];
    const name = MODBUS_EXCEPTION_NAMES[code] ?? `UnknownException(${code})`;
    throw new ProtocolError(`Modbus exception: ${name}`);
  }

  let frame: Buffer;
  let declaredLength: number;
  const registers: number[] = [];

  switch (responseFc) {
    case FC_READ_HOLDING_REGISTERS: {
      declaredLength = response[2];
      frame = checkedFrame(response, MIN_RESPONSE_LENGTH + declaredLength);
      for (let i = 0; i < declaredLength / 2; i++) {
        registers.push(frame.readUInt16BE(3 + i * 2));
      }
      break;
    }
    case FC_WRITE_MULTIPLE_REGISTERS: {
      declaredLength = 4;
      frame = checkedFrame(response, WRITE_RESPONSE_LENGTH);
      registers.push(frame.readUInt16BE(2), frame.readUInt16BE(4));
      break;
    }
    default:
      throw new ProtocolError(
        `Unsupported Modbus function code: 0x${responseFc.toString(16)}`
      );
  }

  if (frame[0] !== request[0]) {
    throw new ProtocolError(
      `Reply from slave ${frame[0]}, expected slave ${request[0]}`
    );
  }
  if (responseFc !== requestFc) {
    throw new ProtocolError(
      `Reply with function code 0x${responseFc.toString(16)} to request 0x${requestFc.toString(16)}`
    );
  }

  if (responseFc === FC_READ_HOLDING_REGISTERS) {
    const quantity = request.readUInt16BE(4);
    if (registers.length !== quantity) {
      throw new ProtocolError(
        `Reply carries ${registers.length} registers, requested ${quantity}`
      );
    }
  } else if (
    registers[0] !== request.readUInt16BE(2) ||
    registers[1] !== request.readUInt16BE(4)
  ) {
    throw new ProtocolError(
      `Write echo 0x${registers[0].toString(16)}/${registers[1]} does not match request`
    );
  }

  return {
    raw: frame,
    functionCode: responseFc,
    declaredLength,
    checksum: frame.readUInt16LE(frame.length - 2),
    registers,
  };
}

function checkedFrame(response: Buffer, expectedLength: number): Buffer {
  if (response.length !== expectedLength) {
    throw new FrameError(
      `Declared length ${expectedLength} does not match received ${response.length} bytes`
    );
  }
  if (!verifyCrc(response)) {
    throw new FrameError("Modbus response CRC verification failed");
  }
  return response;
}
