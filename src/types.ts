/**
 * Decoded telemetry handed to callers of a poll cycle.
 *
 * Units are fixed per field: voltages in millivolts, currents in milliamps,
 * power in watts, temperatures in °C, SOC/SOH in percent. Towers, modules and
 * cells are numbered from 1.
 */

export type BatteryVariant = "HVS" | "HVM" | "LVS";

/** Product line encoded in the serial number; HVL has no cell telemetry */
export type SerialModel = BatteryVariant | "HVL" | "Unknown";

export type GridType = "OffGrid" | "OnGrid" | "Backup" | "Unknown";

export type ErrorFlag =
  | "High Temperature Charging (Cells)"
  | "Low Temperature Charging (Cells)"
  | "Over Current Discharging"
  | "Over Current Charging"
  | "Main circuit Failure"
  | "Short Current Alarm"
  | "Cells Imbalance"
  | "Current Sensor Failure"
  | "Battery Over Voltage"
  | "Battery Under Voltage"
  | "Cell Over Voltage"
  | "Cell Under Voltage"
  | "Voltage Sensor Failure"
  | "Temperature Sensor Failure"
  | "High Temperature Discharging (Cells)"
  | "Low Temperature Discharging (Cells)";

export interface DeviceInfo {
  readonly serial: string;
  readonly modelFromSerial: SerialModel;
  readonly bmuFirmwareA: string;
  readonly bmuFirmwareB: string;
  readonly bmsFirmware: string;
  /** BMU firmware bank currently running */
  readonly activeBmu: "A" | "B";
  readonly grid: GridType;
  readonly inverterType: number;
  readonly batteryType: number;
  readonly variant: BatteryVariant;
  readonly towers: number;
  readonly modulesPerTower: number;
  readonly cellsPerModule: number;
  readonly temperaturesPerModule: number;
  /** Cells across all towers */
  readonly totalCells: number;
  /** Temperature readings across all towers */
  readonly totalTemperatures: number;
}

export interface Module {
  readonly index: number;
  /** mV, `cellsPerModule` entries */
  readonly cellVoltages: readonly number[];
  /** °C, `temperaturesPerModule` entries */
  readonly cellTemperatures: readonly number[];
}

export interface Balancing {
  /** Raw balancing bitmap as reported, hex */
  readonly status: string;
  /** Cell numbers (tower-wide, from 1) currently balancing */
  readonly cells: readonly number[];
  readonly count: number;
}

export interface Tower {
  readonly index: number;
  readonly modules: readonly Module[];
  readonly maxCellVoltage: number;
  readonly minCellVoltage: number;
  readonly avgCellVoltage: number;
  readonly maxCellVoltageCell: number;
  readonly minCellVoltageCell: number;
  readonly maxCellTemperature: number;
  readonly minCellTemperature: number;
  readonly avgCellTemperature: number;
  readonly maxCellTemperatureCell: number;
  readonly minCellTemperatureCell: number;
  readonly balancing: Balancing;
  readonly chargeTotal: number;
  readonly dischargeTotal: number;
  readonly eta: number;
  readonly batteryVoltage: number;
  readonly outputVoltage: number;
  readonly socDiagnosis: number;
  readonly soh: number;
  readonly state: string;
}

export interface TelemetrySnapshot {
  readonly device: DeviceInfo;
  readonly soc: number;
  readonly soh: number;
  /** Pack voltage, mV */
  readonly voltage: number;
  readonly outputVoltage: number;
  /** mA; negative while discharging */
  readonly current: number;
  /** W; negative while discharging */
  readonly power: number;
  readonly maxCellVoltage: number;
  readonly minCellVoltage: number;
  readonly voltageDifference: number;
  readonly maxTemperature: number;
  readonly minTemperature: number;
  readonly batteryTemperature: number;
  readonly paramT: string;
  readonly errorNumber: number;
  readonly errorFlags: readonly ErrorFlag[];
  readonly eta: number;
  readonly diagnosticCounters: Readonly<Record<string, number>>;
  readonly towers: readonly Tower[];
}
