/**
 * Stress Report Session
 *
 * Owns the output files of one stress-test run: appends a CSV row for
 * every sampling iteration and writes the summary once the run is over.
 * A failed append is reported and the run carries on; a failed summary
 * write is raised to the caller.
 */

import { EventEmitter } from 'node:events';
import { basename } from 'node:path';
import { createSubsystemLogger } from '../../logging/subsystem.js';
import { appendCsvRow, buildSampleRow, type CsvValue, type SampleCategories } from '../csv-appender/index.js';
import { ReportIOError } from '../errors.js';
import { getModelName, DEFAULT_MODEL_COMMAND } from '../hardware/index.js';
import { writeSummary } from '../report-assembler/index.js';
import type { OutputTarget, ReportSnapshot } from '../types/index.js';

export interface SampleRecordedEvent {
  iteration: number;
  columns: number;
  timestamp: Date;
}

export interface SampleFailedEvent {
  iteration: number;
  error: ReportIOError;
  timestamp: Date;
}

export interface SummaryWrittenEvent {
  path: string;
  iterations: number;
  timestamp: Date;
}

export interface SessionStatus {
  iterations: number;
  failedSamples: number;
  finished: boolean;
}

export class StressReportSession extends EventEmitter {
  private readonly logger = createSubsystemLogger('report/session');
  private iterations = 0;
  private failedSamples = 0;
  private finished = false;
  private modelName?: string;

  constructor(
    private readonly output: OutputTarget,
    private readonly modelCommand: string = DEFAULT_MODEL_COMMAND,
  ) {
    super();
    this.logger.info('Report session started', { ...output });
  }

  /**
   * Host model name, read once per session
   */
  getModelName(): string {
    this.modelName ??= getModelName(this.modelCommand);
    return this.modelName;
  }

  getOutputTarget(): OutputTarget {
    return { ...this.output };
  }

  getStatus(): SessionStatus {
    return {
      iterations: this.iterations,
      failedSamples: this.failedSamples,
      finished: this.finished,
    };
  }

  /**
   * Appends one iteration's values. Returns false when the row could not be
   * written; the failure is logged and emitted as `sampleFailed`.
   */
  recordSample(values: readonly CsvValue[]): boolean {
    if (this.finished) {
      throw new Error('Report session already finished');
    }

    this.iterations++;
    try {
      appendCsvRow(this.output.csvPath, values);
    } catch (error) {
      if (!(error instanceof ReportIOError)) {
        throw error;
      }
      this.failedSamples++;
      this.logger.warn('Sample not logged, continuing run', {
        iteration: this.iterations,
        error: error.message,
      });
      this.emit('sampleFailed', {
        iteration: this.iterations,
        error,
        timestamp: new Date(),
      } satisfies SampleFailedEvent);
      return false;
    }

    this.emit('sampleRecorded', {
      iteration: this.iterations,
      columns: values.length,
      timestamp: new Date(),
    } satisfies SampleRecordedEvent);
    return true;
  }

  /**
   * Records the live values of the given categories in the default column order
   */
  recordCategories(runTime: number, sample: SampleCategories): boolean {
    return this.recordSample(buildSampleRow(basename(this.output.csvPath), runTime, sample));
  }

  /**
   * Writes the summary report for the finished run
   */
  finish(snapshot: ReportSnapshot): void {
    writeSummary(snapshot, this.output.summaryPath);
    this.finished = true;
    this.logger.info('Report session finished', {
      iterations: this.iterations,
      failedSamples: this.failedSamples,
    });
    this.emit('summaryWritten', {
      path: this.output.summaryPath,
      iterations: snapshot.iterations,
      timestamp: new Date(),
    } satisfies SummaryWrittenEvent);
  }
}
