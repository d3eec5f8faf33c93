/**
 * Assembles one tower's cell-data pages into a {@link Tower}.
 *
 * The device streams the pages in a fixed order and does not label them, so
 * the assembler tracks what it has received: the summary page first, then
 * voltage pages until every cell is covered, then temperature pages.
 */

import { FrameError, ProtocolError } from "./errors.js";
import {
  balancingCells,
  decodeSummaryCells,
  decodeTemperaturePage,
  decodeTowerSummary,
  decodeVoltagePage,
  ratio,
  type TowerSummary,
} from "./packets.js";
import type { Module, Tower } from "./types.js";

export interface TowerLayout {
  readonly modules: number;
  readonly cellsPerModule: number;
  readonly temperaturesPerModule: number;
}

export class TowerDataAssembler {
  private summary: TowerSummary | null = null;
  private readonly voltages: number[] = [];
  private readonly temperatures: number[] = [];
  private readonly cellCount: number;
  private readonly temperatureCount: number;
  private voltagePages = 0;
  private temperaturePages = 0;

  constructor(
    public readonly index: number,
    private readonly layout: TowerLayout
  ) {
    this.cellCount = layout.modules * layout.cellsPerModule;
    this.temperatureCount = layout.modules * layout.temperaturesPerModule;
  }

  get complete(): boolean {
    return (
      this.summary !== null &&
      this.voltages.length === this.cellCount &&
      this.temperatures.length === this.temperatureCount
    );
  }

  /** Number of pages received so far */
  get pages(): number {
    if (this.summary === null) return 0;
    return 1 + this.voltagePages + this.temperaturePages;
  }

  /** Consume the next page, in device order. */
  accept(frame: Buffer): void {
    if (this.complete) {
      throw new ProtocolError(`Unexpected extra page for tower ${this.index}`);
    }

    if (this.summary === null) {
      this.summary = decodeTowerSummary(frame);
      this.voltages.push(...decodeSummaryCells(frame, this.cellCount));
    } else if (this.voltages.length < this.cellCount) {
      this.voltages.push(
        ...decodeVoltagePage(frame, this.cellCount - this.voltages.length)
      );
      this.voltagePages++;
    } else {
      this.temperatures.push(
        ...decodeTemperaturePage(
          frame,
          this.temperatureCount - this.temperatures.length
        )
      );
      this.temperaturePages++;
    }
  }

  /** Build the tower; every cell voltage and temperature must be present. */
  finish(): Tower {
    const summary = this.summary;
    if (summary === null || !this.complete) {
      throw new ProtocolError(
        `Tower ${this.index} incomplete: ${this.voltages.length}/${this.cellCount} voltages, ` +
          `${this.temperatures.length}/${this.temperatureCount} temperatures`
      );
    }

    const modules = splitModules(this.voltages, this.temperatures, this.layout);
    const balancing = balancingCells(summary.balancingBitmap, this.cellCount);

    return {
      index: this.index,
      modules,
      maxCellVoltage: summary.maxCellVoltage,
      minCellVoltage: summary.minCellVoltage,
      avgCellVoltage: average(this.voltages),
      maxCellVoltageCell: summary.maxCellVoltageCell,
      minCellVoltageCell: summary.minCellVoltageCell,
      maxCellTemperature: summary.maxCellTemperature,
      minCellTemperature: summary.minCellTemperature,
      avgCellTemperature: average(this.temperatures),
      maxCellTemperatureCell: summary.maxCellTemperatureCell,
      minCellTemperatureCell: summary.minCellTemperatureCell,
      balancing: {
        status: summary.balancingBitmap.toString("hex"),
        cells: balancing,
        count: balancing.length,
      },
      chargeTotal: summary.chargeTotal,
      dischargeTotal: summary.dischargeTotal,
      eta: ratio(summary.dischargeTotal, summary.chargeTotal),
      batteryVoltage: summary.batteryVoltage,
      outputVoltage: summary.outputVoltage,
      socDiagnosis: summary.socDiagnosis,
      soh: summary.soh,
      state: summary.state,
    };
  }
}

/** Split a tower's flat cell arrays into equally sized modules. */
export function splitModules(
  voltages: readonly number[],
  temperatures: readonly number[],
  layout: TowerLayout
): Module[] {
  if (
    voltages.length !== layout.modules * layout.cellsPerModule ||
    temperatures.length !== layout.modules * layout.temperaturesPerModule
  ) {
    throw new FrameError(
      `Cell data does not fit ${layout.modules} modules of ` +
        `${layout.cellsPerModule} cells / ${layout.temperaturesPerModule} temperatures`
    );
  }

  const modules: Module[] = [];
  for (let m = 0; m < layout.modules; m++) {
    modules.push({
      index: m + 1,
      cellVoltages: voltages.slice(
        m * layout.cellsPerModule,
        (m + 1) * layout.cellsPerModule
      ),
      cellTemperatures: temperatures.slice(
        m * layout.temperaturesPerModule,
        (m + 1) * layout.temperaturesPerModule
      ),
    });
  }
  return modules;
}

/**
 * Check that towers and their modules are numbered 1..n without gaps and
 * that every module of a tower carries the same number of readings.
 */
export function assertContiguous(towers: readonly Tower[]): void {
  towers.forEach((tower, t) => {
    if (tower.index !== t + 1) {
      throw new FrameError(`Tower ${tower.index} found at position ${t + 1}`);
    }
    const first = tower.modules[0];
    tower.modules.forEach((module, m) => {
      if (module.index !== m + 1) {
        throw new FrameError(
          `Tower ${tower.index}: module ${module.index} found at position ${m + 1}`
        );
      }
      if (
        module.cellVoltages.length !== first.cellVoltages.length ||
        module.cellTemperatures.length !== first.cellTemperatures.length
      ) {
        throw new FrameError(
          `Tower ${tower.index}: module ${module.index} cell count differs from module 1`
        );
      }
    });
  });
}

function average(values: readonly number[]): number {
  if (values.length === 0) return 0;
  const sum = values.reduce((acc, v) => acc + v, 0);
  return Math.round((sum / values.length) * 10) / 10;
}
