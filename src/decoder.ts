/**
 * Frame decoder utility.
 *
 * Parses a captured RTU frame (request or reply) and renders its contents in
 * human-readable form, for comparing against device traffic.
 */

import {
  FC_READ_HOLDING_REGISTERS,
  FC_WRITE_MULTIPLE_REGISTERS,
  MODBUS_EXCEPTION_NAMES,
  checksum,
} from "./modbus.js";
import { Register } from "./packets.js";

// ---------- Enums ----------

export enum RtuFrameType {
  ReadRequest = "ReadRequest",
  ReadResponse = "ReadResponse",
  WriteRequest = "WriteRequest",
  WriteResponse = "WriteResponse",
  Exception = "Exception",
  Unknown = "Unknown",
}

const REGISTER_NAMES: Record<number, string> = {
  [Register.BMU_INFO]: "BMU info",
  [Register.IDENTITY]: "Identity",
  [Register.STATUS]: "Pack status",
  [Register.MEASUREMENT_CONTROL]: "Measurement control",
  [Register.MEASUREMENT_STATE]: "Measurement state",
  [Register.CELL_DATA]: "Cell data",
};

function hex(value: number, width: number): string {
  return value.toString(16).padStart(width, "0");
}

// ---------- RtuFrame class ----------

export class RtuFrame {
  private readonly frame: Buffer;

  constructor(hexString: string) {
    this.frame = Buffer.from(hexString.replace(/\s+/g, ""), "hex");
  }

  get length(): number {
    return this.frame.length;
  }

  get slaveId(): number {
    return this.frame[0];
  }

  get functionCode(): number {
    return this.frame[1];
  }

  get frameType(): RtuFrameType {
    const len = this.frame.length;
    if (len < 4) return RtuFrameType.Unknown;
    if (this.functionCode & 0x80) return RtuFrameType.Exception;
    if (this.functionCode === FC_READ_HOLDING_REGISTERS) {
      if (len === 5 + this.frame[2]) return RtuFrameType.ReadResponse;
      if (len === 8) return RtuFrameType.ReadRequest;
    }
    if (this.functionCode === FC_WRITE_MULTIPLE_REGISTERS) {
      if (len === 8) return RtuFrameType.WriteResponse;
      if (len >= 9 && len === 9 + this.frame[6]) return RtuFrameType.WriteRequest;
    }
    return RtuFrameType.Unknown;
  }

  /** CRC as carried by the frame (little-endian on the wire) */
  get frameCrc(): number {
    if (this.frame.length < 4) return 0;
    return this.frame.readUInt16LE(this.frame.length - 2);
  }

  get calculatedCrc(): number {
    return checksum(this.frame.subarray(0, Math.max(0, this.frame.length - 2)));
  }

  get crcValid(): boolean {
    return this.frame.length >= 4 && this.frameCrc === this.calculatedCrc;
  }

  /** Start address for requests and write echoes */
  get address(): number | null {
    switch (this.frameType) {
      case RtuFrameType.ReadRequest:
      case RtuFrameType.WriteRequest:
      case RtuFrameType.WriteResponse:
        return this.frame.readUInt16BE(2);
      default:
        return null;
    }
  }

  get quantity(): number | null {
    switch (this.frameType) {
      case RtuFrameType.ReadRequest:
      case RtuFrameType.WriteRequest:
      case RtuFrameType.WriteResponse:
        return this.frame.readUInt16BE(4);
      default:
        return null;
    }
  }

  /** Register values of a read reply or a write request */
  get registers(): number[] {
    let start: number;
    let count: number;
    if (this.frameType === RtuFrameType.ReadResponse) {
      start = 3;
      count = this.frame[2] / 2;
    } else if (this.frameType === RtuFrameType.WriteRequest) {
      start = 7;
      count = this.frame[6] / 2;
    } else {
      return [];
    }
    const values: number[] = [];
    for (let i = 0; i < count; i++) {
      values.push(this.frame.readUInt16BE(start + i * 2));
    }
    return values;
  }

  get exceptionName(): string | null {
    if (this.frameType !== RtuFrameType.Exception) return null;
    const code = this.frame[2];
    return MODBUS_EXCEPTION_NAMES[code] ?? `UnknownException(${code})`;
  }
}

/**
 * Decode an RTU frame and return a human-readable string.
 *
 * @param hexBytes  Array of hex byte strings (e.g. ["01", "03", "00", ...])
 *                  or a single hex string
 */
export function decode(hexBytes: string | string[]): string {
  const hexString = Array.isArray(hexBytes) ? hexBytes.join("") : hexBytes;
  const frame = new RtuFrame(hexString);

  const lines: string[] = [];
  lines.push(`Frame type: ${frame.frameType} (${frame.length} bytes)`);
  lines.push(`Slave address: ${frame.slaveId}`);
  lines.push(`Function code: ${frame.functionCode} (hex: ${hex(frame.functionCode, 2)})`);

  const address = frame.address;
  if (address !== null) {
    const name = REGISTER_NAMES[address] ?? "unknown";
    lines.push(`Start address: ${address} (hex: ${hex(address, 4)}, ${name})`);
    lines.push(`Quantity: ${frame.quantity}`);
  }

  const exceptionName = frame.exceptionName;
  if (exceptionName !== null) {
    lines.push(`Exception: ${exceptionName}`);
  }

  const registers = frame.registers;
  if (registers.length > 0) {
    lines.push(`Registers (${registers.length}):`);
    for (let i = 0; i < registers.length; i += 8) {
      const row = registers.slice(i, i + 8).map((r) => hex(r, 4)).join(" ");
      lines.push(`  ${String(i).padStart(3)}: ${row}`);
    }
  }

  lines.push(
    `CRC: ${hex(frame.frameCrc, 4)} (calculated: ${hex(frame.calculatedCrc, 4)}, valid: ${frame.crcValid})`
  );

  return lines.join("\n");
}
