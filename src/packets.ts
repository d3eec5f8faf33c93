/**
 * Register map and field decoders for the BMU's replies.
 *
 * All offsets are relative to the start of the RTU reply frame (slave address
 * at 0, function code at 1, byte count at 2, data from 3). Decoders expect a
 * frame that already passed `decodeResponse`.
 */

import { ProtocolError } from "./errors.js";
import { readHoldingRegisters, writeMultipleRegisters } from "./modbus.js";
import type { BatteryVariant, ErrorFlag, GridType, SerialModel } from "./types.js";

export const Register = {
  BMU_INFO: 0x0000,
  IDENTITY: 0x0010,
  STATUS: 0x0500,
  MEASUREMENT_CONTROL: 0x0550,
  MEASUREMENT_STATE: 0x0551,
  CELL_DATA: 0x0558,
} as const;

const BMU_INFO_QUANTITY = 0x66;
const IDENTITY_QUANTITY = 0x03;
const STATUS_QUANTITY = 0x19;
const CELL_DATA_QUANTITY = 0x41;

const START_MEASUREMENT = 0x8100;
/** Set in the measurement state register until the tower data is ready. */
export const MEASUREMENT_PENDING = 0x8000;

// ---------- Requests ----------

export const requests = {
  bmuInfo: (slaveId: number) =>
    readHoldingRegisters(slaveId, Register.BMU_INFO, BMU_INFO_QUANTITY),
  identity: (slaveId: number) =>
    readHoldingRegisters(slaveId, Register.IDENTITY, IDENTITY_QUANTITY),
  status: (slaveId: number) =>
    readHoldingRegisters(slaveId, Register.STATUS, STATUS_QUANTITY),
  /** `tower` is numbered from 1 */
  startMeasurement: (slaveId: number, tower: number) =>
    writeMultipleRegisters(slaveId, Register.MEASUREMENT_CONTROL, [
      0x0001,
      START_MEASUREMENT + (tower - 1),
    ]),
  measurementState: (slaveId: number) =>
    readHoldingRegisters(slaveId, Register.MEASUREMENT_STATE, 1),
  cellData: (slaveId: number) =>
    readHoldingRegisters(slaveId, Register.CELL_DATA, CELL_DATA_QUANTITY),
};

// ---------- Variants ----------

export interface VariantLayout {
  readonly variant: BatteryVariant;
  readonly cellsPerModule: number;
  readonly temperaturesPerModule: number;
}

const VARIANTS: Record<number, VariantLayout> = {
  1: { variant: "HVM", cellsPerModule: 16, temperaturesPerModule: 8 },
  2: { variant: "HVS", cellsPerModule: 32, temperaturesPerModule: 12 },
  3: { variant: "LVS", cellsPerModule: 16, temperaturesPerModule: 8 },
};

// ---------- BMU info (handshake) ----------

export interface BmuInfo {
  readonly serial: string;
  readonly modelFromSerial: SerialModel;
  readonly bmuFirmwareA: string;
  readonly bmuFirmwareB: string;
  readonly bmsFirmware: string;
  readonly activeBmu: "A" | "B";
  readonly towers: number;
  readonly modulesPerTower: number;
  readonly grid: GridType;
}

// Serials start "P03" for LVS, "P02" for the HV lines with the model in the sixth character
const HV_SERIAL_MODELS: Record<string, SerialModel> = {
  "1": "HVS",
  "2": "HVM",
  "3": "HVL",
};

export function modelFromSerial(serial: string): SerialModel {
  if (serial.startsWith("P03")) return "LVS";
  if (serial.startsWith("P02")) return HV_SERIAL_MODELS[serial.charAt(5)] ?? "Unknown";
  return "Unknown";
}

const GRID_TYPES: Record<number, GridType> = {
  0: "OffGrid",
  1: "OnGrid",
  2: "Backup",
};

export function decodeBmuInfo(frame: Buffer): BmuInfo {
  const serial = frame.subarray(3, 22).toString("latin1").replace(/[\x00 ]+$/, "");
  if (!/^[\x21-\x7e][\x20-\x7e]*$/.test(serial)) {
    throw new ProtocolError("BMU info reply carries no serial number");
  }

  const towers = frame[36] >> 4;
  const modulesPerTower = frame[36] & 0x0f;
  if (towers === 0 || modulesPerTower === 0) {
    throw new ProtocolError(
      `BMU reports ${towers} towers with ${modulesPerTower} modules`
    );
  }

  return {
    serial,
    modelFromSerial: modelFromSerial(serial),
    bmuFirmwareA: `V${frame[27]}.${frame[28]}`,
    bmuFirmwareB: `V${frame[29]}.${frame[30]}`,
    bmsFirmware: `V${frame[31]}.${frame[32]}-${String.fromCharCode(frame[34] + 65)}`,
    activeBmu: frame[33] === 0 ? "A" : "B",
    towers,
    modulesPerTower,
    grid: GRID_TYPES[frame[38]] ?? "Unknown",
  };
}

// ---------- Identity ----------

export interface Identity extends VariantLayout {
  readonly inverterType: number;
  readonly batteryType: number;
}

export function decodeIdentity(frame: Buffer): Identity {
  const inverterType = frame[3];
  const batteryType = frame[5];
  const layout = VARIANTS[batteryType];
  if (layout === undefined) {
    throw new ProtocolError(
      `Battery type ${batteryType} has no cell telemetry layout`
    );
  }
  return { inverterType, batteryType, ...layout };
}

// ---------- Pack status ----------

export const ERROR_FLAGS: readonly ErrorFlag[] = [
  "High Temperature Charging (Cells)",
  "Low Temperature Charging (Cells)",
  "Over Current Discharging",
  "Over Current Charging",
  "Main circuit Failure",
  "Short Current Alarm",
  "Cells Imbalance",
  "Current Sensor Failure",
  "Battery Over Voltage",
  "Battery Under Voltage",
  "Cell Over Voltage",
  "Cell Under Voltage",
  "Voltage Sensor Failure",
  "Temperature Sensor Failure",
  "High Temperature Discharging (Cells)",
  "Low Temperature Discharging (Cells)",
];

export function decodeErrorFlags(errorNumber: number): ErrorFlag[] {
  return ERROR_FLAGS.filter((_, bit) => (errorNumber & (1 << bit)) !== 0);
}

export interface PackStatus {
  readonly soc: number;
  readonly soh: number;
  readonly voltage: number;
  readonly outputVoltage: number;
  readonly current: number;
  readonly power: number;
  readonly maxCellVoltage: number;
  readonly minCellVoltage: number;
  readonly voltageDifference: number;
  readonly maxTemperature: number;
  readonly minTemperature: number;
  readonly batteryTemperature: number;
  readonly errorNumber: number;
  readonly errorFlags: ErrorFlag[];
  readonly paramT: string;
  readonly chargeTotal: number;
  readonly dischargeTotal: number;
  readonly eta: number;
}

export function decodeStatus(frame: Buffer): PackStatus {
  // 10 mV, 100 mA and 10 mV units on the wire
  const maxCellVoltage = frame.readInt16BE(5) * 10;
  const minCellVoltage = frame.readInt16BE(7) * 10;
  const current = frame.readInt16BE(11) * 100;
  const outputVoltage = frame.readUInt16BE(35) * 10;
  const errorNumber = frame.readUInt16BE(29);
  const chargeTotal = frame.readUInt32BE(37);
  const dischargeTotal = frame.readUInt32BE(41);

  return {
    soc: frame.readInt16BE(3),
    soh: frame.readInt16BE(9),
    voltage: frame.readUInt16BE(13) * 10,
    outputVoltage,
    current,
    power: Math.round((current * outputVoltage) / 1e4) / 100,
    maxCellVoltage,
    minCellVoltage,
    voltageDifference: maxCellVoltage - minCellVoltage,
    maxTemperature: frame.readInt16BE(15),
    minTemperature: frame.readInt16BE(17),
    batteryTemperature: frame.readInt16BE(19),
    errorNumber,
    errorFlags: decodeErrorFlags(errorNumber),
    paramT: `${frame[31]}.${frame[32]}`,
    chargeTotal,
    dischargeTotal,
    eta: ratio(dischargeTotal, chargeTotal),
  };
}

/** discharged / charged, three decimals; 0 before anything was charged */
export function ratio(discharged: number, charged: number): number {
  if (charged === 0) return 0;
  return Math.round((discharged / charged) * 1000) / 1000;
}

// ---------- Tower cell-data pages ----------

/** Cell voltages carried by the summary page, from offset 101 */
export const SUMMARY_PAGE_CELLS = 16;
/** Cell voltages per continuation page, from offset 5 */
export const VOLTAGE_PAGE_CELLS = 64;
/** Temperature readings per temperature page, from offset 5 */
export const TEMPERATURE_PAGE_READINGS = 128;

const SUMMARY_CELLS_OFFSET = 101;
const PAGE_DATA_OFFSET = 5;
const BALANCING_OFFSET = 17;
const BALANCING_BYTES = 16;

export interface TowerSummary {
  readonly maxCellVoltage: number;
  readonly minCellVoltage: number;
  readonly maxCellVoltageCell: number;
  readonly minCellVoltageCell: number;
  readonly maxCellTemperature: number;
  readonly minCellTemperature: number;
  readonly maxCellTemperatureCell: number;
  readonly minCellTemperatureCell: number;
  readonly balancingBitmap: Buffer;
  readonly chargeTotal: number;
  readonly dischargeTotal: number;
  readonly batteryVoltage: number;
  readonly outputVoltage: number;
  readonly socDiagnosis: number;
  readonly soh: number;
  readonly state: string;
}

export function decodeTowerSummary(frame: Buffer): TowerSummary {
  return {
    maxCellVoltage: frame.readInt16BE(5),
    minCellVoltage: frame.readInt16BE(7),
    maxCellVoltageCell: frame[9],
    minCellVoltageCell: frame[10],
    maxCellTemperature: frame.readInt16BE(11),
    minCellTemperature: frame.readInt16BE(13),
    maxCellTemperatureCell: frame[15],
    minCellTemperatureCell: frame[16],
    balancingBitmap: Buffer.from(
      frame.subarray(BALANCING_OFFSET, BALANCING_OFFSET + BALANCING_BYTES)
    ),
    chargeTotal: frame.readUInt32BE(33),
    dischargeTotal: frame.readUInt32BE(37),
    // 100 mV units
    batteryVoltage: frame.readInt16BE(45) * 100,
    outputVoltage: frame.readInt16BE(51) * 100,
    socDiagnosis: frame.readInt16BE(53) / 10,
    soh: frame.readInt16BE(55),
    state: frame.subarray(57, 61).toString("hex"),
  };
}

export function decodeSummaryCells(frame: Buffer, count: number): number[] {
  return readInt16Run(frame, SUMMARY_CELLS_OFFSET, Math.min(count, SUMMARY_PAGE_CELLS));
}

export function decodeVoltagePage(frame: Buffer, count: number): number[] {
  return readInt16Run(frame, PAGE_DATA_OFFSET, Math.min(count, VOLTAGE_PAGE_CELLS));
}

export function decodeTemperaturePage(frame: Buffer, count: number): number[] {
  const values: number[] = [];
  const n = Math.min(count, TEMPERATURE_PAGE_READINGS);
  for (let i = 0; i < n; i++) {
    values.push(frame.readInt8(PAGE_DATA_OFFSET + i));
  }
  return values;
}

/** Cell numbers (from 1) whose bit is set, limited to `cellCount` */
export function balancingCells(bitmap: Buffer, cellCount: number): number[] {
  const cells: number[] = [];
  for (let cell = 0; cell < cellCount && cell < bitmap.length * 8; cell++) {
    if (bitmap[cell >> 3] & (1 << (cell & 7))) {
      cells.push(cell + 1);
    }
  }
  return cells;
}

function readInt16Run(frame: Buffer, offset: number, count: number): number[] {
  const values: number[] = [];
  for (let i = 0; i < count; i++) {
    values.push(frame.readInt16BE(offset + i * 2));
  }
  return values;
}
