/**
 * Section Renderer
 *
 * Turns category records into titled, headered blocks of aligned rows.
 * Every category is dispatched on its `kind` tag to a builder that knows
 * its grouping, its layout and which rows it omits. Categories flagged
 * empty, and groups left without rows, produce no output at all.
 */

import { cellText, formatLine, justify, type CellValue, type Justification } from '../line-formatter/index.js';
import {
  getDriveModel,
  getGpuSubsystem,
  type CpuFrequencyCategory,
  type CpuUsageCategory,
  type DriveCategory,
  type FanCategory,
  type GpuCategory,
  type MemoryCategory,
  type MetricCategory,
  type StatRecord,
} from '../types/index.js';
import { groupBy, groupByDiscriminator, type RecordGroup } from './grouping.js';
import {
  CPU_LAYOUT,
  CPU_TEMPERATURE_LAYOUT,
  DEVICE_DATA_LAYOUT,
  FAN_LAYOUT,
  POWER_LAYOUT,
  memoryLayout,
  type SectionLayout,
} from './layouts.js';

export type DataRow = readonly CellValue[];

export interface Section {
  /** Title line; empty when the section has none */
  title: string;
  layout: SectionLayout;
  rows: DataRow[];
}

/** Vendor whose section title carries the installed driver version */
export const DISCRETE_GPU_VENDOR = 'nvidia';

/**
 * Renders one section: title, header, one line per row and a blank
 * separator. Renders nothing when there are no rows.
 */
export function renderSection(
  title: string,
  rows: readonly DataRow[],
  headers: readonly CellValue[],
  widths: readonly number[],
  justifications: readonly Justification[],
): string {
  if (rows.length === 0) {
    return '';
  }

  const lines: string[] = [];
  if (title) {
    lines.push(`${title}\n`);
  }
  lines.push(formatLine(headers, widths, justifications));
  for (const row of rows) {
    lines.push(formatLine(row, widths, justifications));
  }
  lines.push('\n');
  return lines.join('');
}

export function renderSections(sections: readonly Section[]): string {
  return sections
    .map(({ title, rows, layout }) =>
      renderSection(title, rows, layout.headers, layout.widths, layout.justifications))
    .join('');
}

function statRow(record: StatRecord): DataRow {
  return [record.label, record.min, record.max, record.mean];
}

function currentStatRow(record: StatRecord): DataRow {
  return [record.label, record.current, record.min, record.max, record.mean];
}

function hasCurrent(record: StatRecord): boolean {
  return record.current !== null;
}

function buildMemorySections(memory: MemoryCategory): Section[] {
  return groupByDiscriminator(memory.records).map(group => ({
    title: '',
    layout: memoryLayout(group.discriminator),
    rows: group.records.map(statRow),
  }));
}

function buildSingleSection(records: readonly StatRecord[], layout: SectionLayout): Section[] {
  return [{ title: '', layout, rows: records.map(statRow) }];
}

function buildFanSections(fans: FanCategory): Section[] {
  return groupByDiscriminator(fans.records).map(group => ({
    title: group.discriminator,
    layout: FAN_LAYOUT,
    rows: group.records.map(currentStatRow),
  }));
}

export function gpuVendorTitle(gpus: GpuCategory, vendor: string): string {
  if (vendor === DISCRETE_GPU_VENDOR && gpus.driverVersion) {
    return `${vendor} - ${gpus.driverVersion}`;
  }
  return vendor;
}

export function gpuDeviceHeading(gpus: GpuCategory, vendor: string, name: string): string {
  const subsystem = getGpuSubsystem(gpus, vendor, name);
  return subsystem ? `GPU: ${name}\nSubSystem: ${subsystem}` : `GPU: ${name}`;
}

function gpuVendorRows(gpus: GpuCategory, group: RecordGroup<StatRecord>): DataRow[] {
  const rows: DataRow[] = [];
  const devices = groupBy(group.records, record => record.key[1] ?? '');
  for (const device of devices) {
    rows.push([gpuDeviceHeading(gpus, group.discriminator, device.discriminator)]);
    rows.push(...device.records.filter(hasCurrent).map(currentStatRow));
  }
  return rows;
}

function buildGpuSections(gpus: GpuCategory): Section[] {
  return groupByDiscriminator(gpus.records).map(group => ({
    title: gpuVendorTitle(gpus, group.discriminator),
    layout: DEVICE_DATA_LAYOUT,
    rows: gpuVendorRows(gpus, group),
  }));
}

function buildDriveSections(drives: DriveCategory): Section[] {
  return groupByDiscriminator(drives.records).map(group => ({
    title: `Device: ${group.discriminator}\nDrive Model: ${getDriveModel(drives, group.discriminator)}`,
    layout: DEVICE_DATA_LAYOUT,
    rows: group.records.filter(hasCurrent).map(currentStatRow),
  }));
}

/**
 * Usage and frequency packed into one cell, e.g. `  42: 3600`
 */
export function usageFrequencyCell(usage: number | null, frequency: number): string {
  return `${justify(cellText(usage), 4, 'right')}:${justify(cellText(frequency), 5, 'right')}`;
}

/**
 * One row per core, pairing each frequency record with the usage record
 * that carries the same label.
 */
export function buildCpuSections(frequency: CpuFrequencyCategory, usage: CpuUsageCategory): Section[] {
  if (frequency.isEmpty) {
    return [];
  }

  const usageByCore = new Map(usage.records.map(record => [record.label, record] as const));
  const rows = frequency.records.map((mhz): DataRow => {
    const pct = usage.isEmpty ? undefined : usageByCore.get(mhz.label);
    return [
      mhz.label,
      usageFrequencyCell(pct?.min ?? null, mhz.min),
      usageFrequencyCell(pct?.max ?? null, mhz.max),
      usageFrequencyCell(pct?.mean ?? null, mhz.mean),
    ];
  });
  return [{ title: '', layout: CPU_LAYOUT, rows }];
}

export type StandaloneCategory = Exclude<MetricCategory, CpuFrequencyCategory | CpuUsageCategory>;

/**
 * Builds the sections of a category rendered on its own. CPU frequency
 * and usage share one table and go through {@link buildCpuSections}.
 */
export function buildCategorySections(category: StandaloneCategory): Section[] {
  if (category.isEmpty) {
    return [];
  }

  switch (category.kind) {
    case 'memory':
      return buildMemorySections(category);
    case 'cpuTemperature':
      return buildSingleSection(category.records, CPU_TEMPERATURE_LAYOUT);
    case 'power':
      return buildSingleSection(category.records, POWER_LAYOUT);
    case 'fans':
      return buildFanSections(category);
    case 'gpus':
      return buildGpuSections(category);
    case 'drives':
      return buildDriveSections(category);
  }
}

export function renderCategory(category: StandaloneCategory): string {
  return renderSections(buildCategorySections(category));
}
