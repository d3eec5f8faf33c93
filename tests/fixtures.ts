/**
 * Reply frames as the BMU sends them, built from plain field values.
 *
 * Offsets below are data-relative (frame offset - 3).
 */

import { addCrc } from "../src/modbus.js";

export const TEST_SERIAL = "TESTSERIAL000000001";

export function readReply(data: Buffer, slaveId = 1): Buffer {
  return addCrc(Buffer.concat([Buffer.from([slaveId, 0x03, data.length]), data]));
}

export interface BmuInfoFields {
  serial?: string;
  towers?: number;
  modulesPerTower?: number;
  grid?: number;
  activeBmu?: number;
}

export function bmuInfoData(fields: BmuInfoFields = {}): Buffer {
  const data = Buffer.alloc(204);
  data.write(fields.serial ?? TEST_SERIAL, 0, "latin1");
  data[24] = 3; // BMU A V3.16
  data[25] = 16;
  data[26] = 3; // BMU B V3.17
  data[27] = 17;
  data[28] = 3; // BMS V3.24-B
  data[29] = 24;
  data[30] = fields.activeBmu ?? 1;
  data[31] = 1;
  data[33] = ((fields.towers ?? 1) << 4) | (fields.modulesPerTower ?? 2);
  data[35] = fields.grid ?? 1;
  return data;
}

export function identityData(batteryType = 1, inverterType = 3): Buffer {
  const data = Buffer.alloc(6);
  data[0] = inverterType;
  data[2] = batteryType;
  return data;
}

export interface StatusFields {
  soc?: number;
  /** 10 mV units */
  maxCellVoltage?: number;
  minCellVoltage?: number;
  soh?: number;
  /** 100 mA units */
  current?: number;
  /** 10 mV units */
  voltage?: number;
  maxTemperature?: number;
  minTemperature?: number;
  batteryTemperature?: number;
  errorNumber?: number;
  paramT?: [number, number];
  /** 10 mV units */
  outputVoltage?: number;
  chargeTotal?: number;
  dischargeTotal?: number;
}

export function statusData(fields: StatusFields = {}): Buffer {
  const data = Buffer.alloc(50);
  data.writeInt16BE(fields.soc ?? 87, 0);
  data.writeInt16BE(fields.maxCellVoltage ?? 334, 2);
  data.writeInt16BE(fields.minCellVoltage ?? 331, 4);
  data.writeInt16BE(fields.soh ?? 100, 6);
  data.writeInt16BE(fields.current ?? 52, 8);
  data.writeUInt16BE(fields.voltage ?? 10624, 10);
  data.writeInt16BE(fields.maxTemperature ?? 24, 12);
  data.writeInt16BE(fields.minTemperature ?? 21, 14);
  data.writeInt16BE(fields.batteryTemperature ?? 22, 16);
  data.writeUInt16BE(fields.errorNumber ?? 0, 26);
  const [a, b] = fields.paramT ?? [1, 5];
  data[28] = a;
  data[29] = b;
  data.writeUInt16BE(fields.outputVoltage ?? 10600, 32);
  data.writeUInt32BE(fields.chargeTotal ?? 2000, 34);
  data.writeUInt32BE(fields.dischargeTotal ?? 1800, 38);
  return data;
}

export interface SummaryFields {
  maxCellVoltage?: number;
  minCellVoltage?: number;
  maxCellVoltageCell?: number;
  minCellVoltageCell?: number;
  maxCellTemperature?: number;
  minCellTemperature?: number;
  maxCellTemperatureCell?: number;
  minCellTemperatureCell?: number;
  balancing?: number[];
  chargeTotal?: number;
  dischargeTotal?: number;
  /** 100 mV units */
  batteryVoltage?: number;
  outputVoltage?: number;
  /** 0.1 % units */
  socDiagnosis?: number;
  soh?: number;
  state?: string;
}

/** Summary page: tower fields plus the first cell voltages (at most 16). */
export function summaryPageData(fields: SummaryFields, cells: number[]): Buffer {
  const data = Buffer.alloc(130);
  data.writeInt16BE(fields.maxCellVoltage ?? 3340, 2);
  data.writeInt16BE(fields.minCellVoltage ?? 3310, 4);
  data[6] = fields.maxCellVoltageCell ?? 1;
  data[7] = fields.minCellVoltageCell ?? 2;
  data.writeInt16BE(fields.maxCellTemperature ?? 24, 8);
  data.writeInt16BE(fields.minCellTemperature ?? 21, 10);
  data[12] = fields.maxCellTemperatureCell ?? 3;
  data[13] = fields.minCellTemperatureCell ?? 4;
  for (const cell of fields.balancing ?? []) {
    data[14 + ((cell - 1) >> 3)] |= 1 << ((cell - 1) & 7);
  }
  data.writeUInt32BE(fields.chargeTotal ?? 1000, 30);
  data.writeUInt32BE(fields.dischargeTotal ?? 900, 34);
  data.writeInt16BE(fields.batteryVoltage ?? 1062, 42);
  data.writeInt16BE(fields.outputVoltage ?? 1060, 48);
  data.writeInt16BE(fields.socDiagnosis ?? 875, 50);
  data.writeInt16BE(fields.soh ?? 100, 52);
  Buffer.from(fields.state ?? "00010203", "hex").copy(data, 54);
  cells.slice(0, 16).forEach((v, i) => data.writeInt16BE(v, 98 + i * 2));
  return data;
}

export function voltagePageData(cells: number[]): Buffer {
  const data = Buffer.alloc(130);
  cells.slice(0, 64).forEach((v, i) => data.writeInt16BE(v, 2 + i * 2));
  return data;
}

export function temperaturePageData(readings: number[]): Buffer {
  const data = Buffer.alloc(130);
  readings.slice(0, 128).forEach((v, i) => data.writeInt8(v, 2 + i));
  return data;
}

/** Cell voltage the fake device reports for `cell` (from 1) of `tower`. */
export function cellVoltage(tower: number, cell: number): number {
  return 3300 + tower * 10 + (cell % 7);
}

/** Temperature the fake device reports for reading `n` (from 1) of `tower`. */
export function cellTemperature(tower: number, n: number): number {
  return 20 + tower + (n % 3);
}

/** Every cell-data page the device streams for one tower, in order. */
export function towerPages(
  tower: number,
  cellCount: number,
  temperatureCount: number,
  summary: SummaryFields = {}
): Buffer[] {
  const cells = Array.from({ length: cellCount }, (_, i) => cellVoltage(tower, i + 1));
  const temps = Array.from({ length: temperatureCount }, (_, i) =>
    cellTemperature(tower, i + 1)
  );

  const pages = [readReply(summaryPageData(summary, cells))];
  for (let i = 16; i < cells.length; i += 64) {
    pages.push(readReply(voltagePageData(cells.slice(i, i + 64))));
  }
  for (let i = 0; i < temps.length; i += 128) {
    pages.push(readReply(temperaturePageData(temps.slice(i, i + 128))));
  }
  return pages;
}
