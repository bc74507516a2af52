/**
 * ReportSnapshot Interface
 *
 * The complete set of aggregated statistics for one finished run.
 */

import type {
  CpuFrequencyCategory,
  CpuTemperatureCategory,
  CpuUsageCategory,
  DriveCategory,
  FanCategory,
  GpuCategory,
  MemoryCategory,
  PowerCategory,
} from './category.js';

export interface ReportSnapshot {
  /** Run start time, already formatted for display */
  startTime: string;
  /** Elapsed run time in seconds */
  runTime: number;
  /** Number of sampling iterations aggregated */
  iterations: number;
  /** Host model name */
  modelName: string;

  memory: MemoryCategory;
  cpuFrequency: CpuFrequencyCategory;
  cpuUsage: CpuUsageCategory;
  cpuTemperature: CpuTemperatureCategory;
  power: PowerCategory;
  fans: FanCategory;
  gpus: GpuCategory;
  drives: DriveCategory;
}
