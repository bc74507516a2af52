/**
 * Report Assembler
 *
 * Builds the summary document for a finished run and writes it over the
 * previous one. Categories are rendered in a fixed order:
 * memory, CPU frequency/usage, CPU temperature, power, fans, GPUs, drives.
 */

import { renameSync, rmSync, writeFileSync } from 'node:fs';
import { createSubsystemLogger } from '../../logging/subsystem.js';
import { ReportIOError } from '../errors.js';
import {
  buildCategorySections,
  buildCpuSections,
  renderSections,
  type Section,
} from '../section-renderer/index.js';
import type { ReportSnapshot } from '../types/index.js';

const log = createSubsystemLogger('report/assembler');

export function renderPreamble(snapshot: ReportSnapshot): string {
  const lines = [
    'Summary:',
    `Model: ${snapshot.modelName}`,
    `Start Time: ${snapshot.startTime}`,
    `Runtime: ${snapshot.runTime}`,
    `CPU: ${snapshot.cpuFrequency.model}`,
    'Memory SKUs:',
    ...snapshot.memory.skus.map(sku => `DIMM: ${sku}`),
  ];
  return lines.map(line => `${line}\n`).join('');
}

export function buildReportSections(snapshot: ReportSnapshot): Section[] {
  return [
    ...buildCategorySections(snapshot.memory),
    ...buildCpuSections(snapshot.cpuFrequency, snapshot.cpuUsage),
    ...buildCategorySections(snapshot.cpuTemperature),
    ...buildCategorySections(snapshot.power),
    ...buildCategorySections(snapshot.fans),
    ...buildCategorySections(snapshot.gpus),
    ...buildCategorySections(snapshot.drives),
  ];
}

function renderSummary(snapshot: ReportSnapshot, sections: readonly Section[]): string {
  return renderPreamble(snapshot) + renderSections(sections);
}

export function buildSummary(snapshot: ReportSnapshot): string {
  return renderSummary(snapshot, buildReportSections(snapshot));
}

/**
 * Writes the summary report, replacing any earlier one. The text goes to
 * a sibling temporary file first and is renamed into place; the temporary
 * file is removed when either step fails.
 */
export function writeSummary(snapshot: ReportSnapshot, summaryPath: string): void {
  const sections = buildReportSections(snapshot);
  const text = renderSummary(snapshot, sections);
  const tempPath = `${summaryPath}.tmp`;

  try {
    writeFileSync(tempPath, text, { encoding: 'utf8' });
    renameSync(tempPath, summaryPath);
  } catch (error) {
    rmSync(tempPath, { force: true });
    log.error('Failed to write summary report', {
      path: summaryPath,
      error: error instanceof Error ? error.message : String(error),
    });
    throw new ReportIOError(summaryPath, 'write', error);
  }

  log.info('Summary report written', {
    path: summaryPath,
    sections: sections.filter(section => section.rows.length > 0).length,
    iterations: snapshot.iterations,
  });
}
