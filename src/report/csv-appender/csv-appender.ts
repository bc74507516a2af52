/**
 * CSV Appender
 *
 * Appends one row per sampling iteration to the run's CSV log. Rows already
 * in the file are never touched.
 */

import { appendFileSync } from 'node:fs';
import { createSubsystemLogger } from '../../logging/subsystem.js';
import { ReportIOError } from '../errors.js';
import type { MetricCategory, ReportSnapshot } from '../types/index.js';

const log = createSubsystemLogger('report/csv');

export type CsvValue = string | number | null | undefined;

export type SampleCategories = Pick<
  ReportSnapshot,
  'cpuFrequency' | 'cpuTemperature' | 'power' | 'fans' | 'gpus' | 'drives' | 'cpuUsage' | 'memory'
>;

const NEEDS_QUOTING = /[",\r\n]/;

export function escapeCsvField(value: CsvValue): string {
  if (value === null || value === undefined) {
    return '';
  }
  const text = String(value);
  return NEEDS_QUOTING.test(text) ? `"${text.replaceAll('"', '""')}"` : text;
}

export function formatCsvRow(values: readonly CsvValue[]): string {
  return values.map(escapeCsvField).join(',') + '\n';
}

function currentValues(category: MetricCategory): Array<number | null> {
  return category.isEmpty ? [] : category.records.map(record => record.current);
}

/**
 * Flattens one iteration's live values in log column order: file name,
 * run time, frequencies, CPU temperatures, power, fans, GPU data, drive
 * data, usage, memory. Categories absent on the machine contribute no
 * columns; unsampled values leave an empty cell.
 */
export function buildSampleRow(csvFileName: string, runTime: number, sample: SampleCategories): CsvValue[] {
  return [
    csvFileName,
    runTime,
    ...currentValues(sample.cpuFrequency),
    ...currentValues(sample.cpuTemperature),
    ...currentValues(sample.power),
    ...currentValues(sample.fans),
    ...currentValues(sample.gpus),
    ...currentValues(sample.drives),
    ...currentValues(sample.cpuUsage),
    ...currentValues(sample.memory),
  ];
}

/**
 * Appends a row, creating the log when it does not exist yet
 */
export function appendCsvRow(csvPath: string, values: readonly CsvValue[]): void {
  try {
    appendFileSync(csvPath, formatCsvRow(values), { encoding: 'utf8' });
  } catch (error) {
    log.error('Failed to append CSV row', {
      path: csvPath,
      error: error instanceof Error ? error.message : String(error),
    });
    throw new ReportIOError(csvPath, 'append', error);
  }
  log.debug('CSV row appended', { path: csvPath, columns: values.length });
}
