/**
 * Metric Category Variants
 *
 * Each metric category is a tagged variant carrying its records, an
 * emptiness flag and whatever metadata its section needs. Records sharing
 * a discriminator are expected to be contiguous in iteration order.
 */

import type { StatRecord } from './stat-record.js';

export type CategoryKind =
  | 'memory'
  | 'cpuFrequency'
  | 'cpuUsage'
  | 'cpuTemperature'
  | 'power'
  | 'fans'
  | 'gpus'
  | 'drives';

interface CategoryBase<K extends CategoryKind> {
  kind: K;
  /** True when the hardware behind this category is absent on the machine */
  isEmpty: boolean;
  records: readonly StatRecord[];
}

export interface MemoryCategory extends CategoryBase<'memory'> {
  /** Part numbers of the installed DIMMs */
  skus: readonly string[];
}

export interface CpuFrequencyCategory extends CategoryBase<'cpuFrequency'> {
  /** CPU model string reported by the processor */
  model: string;
}

export type CpuUsageCategory = CategoryBase<'cpuUsage'>;
export type CpuTemperatureCategory = CategoryBase<'cpuTemperature'>;
export type PowerCategory = CategoryBase<'power'>;
export type FanCategory = CategoryBase<'fans'>;

export interface GpuDevice {
  vendor: string;
  name: string;
  subsystem: string | null;
}

export interface GpuCategory extends CategoryBase<'gpus'> {
  /** Driver version of the discrete GPU vendor, when one is installed */
  driverVersion: string | null;
  devices: readonly GpuDevice[];
}

export interface DriveCategory extends CategoryBase<'drives'> {
  /** Drive model string keyed by device id */
  models: Readonly<Record<string, string>>;
}

export type MetricCategory =
  | MemoryCategory
  | CpuFrequencyCategory
  | CpuUsageCategory
  | CpuTemperatureCategory
  | PowerCategory
  | FanCategory
  | GpuCategory
  | DriveCategory;

/**
 * Subsystem name of a GPU device, looked up by vendor and device name
 */
export function getGpuSubsystem(gpus: GpuCategory, vendor: string, name: string): string | null {
  const device = gpus.devices.find(d => d.vendor === vendor && d.name === name);
  return device?.subsystem ?? null;
}

export function getDriveModel(drives: DriveCategory, deviceId: string): string {
  return Object.hasOwn(drives.models, deviceId) ? drives.models[deviceId] : 'Unknown';
}
