/**
 * Stress Report Entry Point
 *
 * Turns the aggregated statistics of a hardware stress-test run into a
 * per-iteration CSV log and a grouped, column-aligned summary report.
 */

export * from './types/index.js';
export * from './errors.js';
export { loadConfig, type ReportConfig, type ReportEnv } from './config.js';
export { parseReportSnapshot, reportSnapshotSchema, statRecordSchema } from './snapshot-schema.js';

export { formatLine, justify, cellText, ABSENT_CELL, type CellValue, type Justification } from './line-formatter/index.js';
export {
  renderSection,
  renderSections,
  renderCategory,
  buildCategorySections,
  buildCpuSections,
  groupByDiscriminator,
  countDiscriminatorRuns,
  DISCRETE_GPU_VENDOR,
  type DataRow,
  type Section,
  type SectionLayout,
  type StandaloneCategory,
} from './section-renderer/index.js';
export { buildSummary, buildReportSections, renderPreamble, writeSummary } from './report-assembler/index.js';
export { appendCsvRow, buildSampleRow, formatCsvRow, type CsvValue, type SampleCategories } from './csv-appender/index.js';
export { getModelName, DEFAULT_MODEL_COMMAND } from './hardware/index.js';
export {
  StressReportSession,
  createReportSession,
  type SessionStatus,
  type SampleRecordedEvent,
  type SampleFailedEvent,
  type SummaryWrittenEvent,
} from './session/index.js';

export { createSubsystemLogger, configureRootLogger, type SubsystemLogger } from '../logging/subsystem.js';
