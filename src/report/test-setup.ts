/**
 * Shared test data for the report engine: record factories for example
 * tests and fast-check generators for property tests.
 */

import * as fc from 'fast-check';
import type {
  CpuFrequencyCategory,
  CpuTemperatureCategory,
  CpuUsageCategory,
  DriveCategory,
  FanCategory,
  GpuCategory,
  MemoryCategory,
  PowerCategory,
  ReportSnapshot,
  StatRecord,
} from './types/index.js';

export function stat(
  key: readonly string[],
  label: string,
  min: number,
  max: number,
  mean: number,
  current: number | null = null,
): StatRecord {
  return { key, label, current, min, max, mean };
}

export function memoryCategory(records: StatRecord[], skus: string[] = []): MemoryCategory {
  return { kind: 'memory', isEmpty: records.length === 0, records, skus };
}

export function cpuFrequencyCategory(records: StatRecord[], model = 'Test CPU 8-Core'): CpuFrequencyCategory {
  return { kind: 'cpuFrequency', isEmpty: records.length === 0, records, model };
}

export function cpuUsageCategory(records: StatRecord[]): CpuUsageCategory {
  return { kind: 'cpuUsage', isEmpty: records.length === 0, records };
}

export function cpuTemperatureCategory(records: StatRecord[]): CpuTemperatureCategory {
  return { kind: 'cpuTemperature', isEmpty: records.length === 0, records };
}

export function powerCategory(records: StatRecord[]): PowerCategory {
  return { kind: 'power', isEmpty: records.length === 0, records };
}

export function fanCategory(records: StatRecord[]): FanCategory {
  return { kind: 'fans', isEmpty: records.length === 0, records };
}

export function gpuCategory(
  records: StatRecord[],
  extras: Partial<Pick<GpuCategory, 'driverVersion' | 'devices'>> = {},
): GpuCategory {
  return {
    kind: 'gpus',
    isEmpty: records.length === 0,
    records,
    driverVersion: extras.driverVersion ?? null,
    devices: extras.devices ?? [],
  };
}

export function driveCategory(records: StatRecord[], models: Record<string, string> = {}): DriveCategory {
  return { kind: 'drives', isEmpty: records.length === 0, records, models };
}

/**
 * A snapshot of a machine with no sensors at all
 */
export function emptySnapshot(overrides: Partial<ReportSnapshot> = {}): ReportSnapshot {
  return {
    startTime: '2024-07-30 12:00:00',
    runTime: 0,
    iterations: 0,
    modelName: 'TestBox',
    memory: memoryCategory([]),
    cpuFrequency: cpuFrequencyCategory([]),
    cpuUsage: cpuUsageCategory([]),
    cpuTemperature: cpuTemperatureCategory([]),
    power: powerCategory([]),
    fans: fanCategory([]),
    gpus: gpuCategory([]),
    drives: driveCategory([]),
    ...overrides,
  };
}

const statValueArbitrary = fc.integer({ min: 0, max: 100000 });

export const statRecordArbitrary = (key: readonly string[], label: string): fc.Arbitrary<StatRecord> =>
  fc.record({
    current: fc.option(statValueArbitrary, { nil: null }),
    min: statValueArbitrary,
    max: statValueArbitrary,
    mean: statValueArbitrary,
  }).map(values => ({ key, label, ...values }));

/**
 * Records split into contiguous runs, each run under its own discriminator
 * (`group-0`, `group-1`, ...). Labels are unique across the whole list.
 */
export const groupedRecordsArbitrary: fc.Arbitrary<StatRecord[]> = fc
  .array(fc.integer({ min: 1, max: 4 }), { minLength: 1, maxLength: 6 })
  .chain(runLengths => {
    const slots = runLengths.flatMap((length, group) =>
      Array.from({ length }, (_, index) => ({ group: `group-${group}`, label: `sensor-${group}-${index}` })));
    return fc.tuple(...slots.map(slot => statRecordArbitrary([slot.group, slot.label], slot.label)));
  });

/**
 * Records in any discriminator order, drawn from a small discriminator pool
 * so that runs repeat and interleave.
 */
export const interleavedRecordsArbitrary: fc.Arbitrary<StatRecord[]> = fc
  .array(fc.constantFrom('a', 'b', 'c'), { minLength: 1, maxLength: 12 })
  .chain(discriminators =>
    fc.tuple(...discriminators.map((group, index) => statRecordArbitrary([group, `s${index}`], `s${index}`))));

export const propertyTestConfig = {
  numRuns: 50,
};
