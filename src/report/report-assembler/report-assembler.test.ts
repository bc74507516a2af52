/**
 * Unit Tests for the Report Assembler
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { buildReportSections, buildSummary, renderPreamble, writeSummary } from './report-assembler.js';
import { ReportIOError } from '../errors.js';
import {
  cpuFrequencyCategory,
  cpuTemperatureCategory,
  cpuUsageCategory,
  driveCategory,
  emptySnapshot,
  fanCategory,
  gpuCategory,
  memoryCategory,
  stat,
} from '../test-setup.js';
import type { ReportSnapshot } from '../types/index.js';

const mockLogger = vi.hoisted(() => ({
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  fatal: vi.fn(),
  debug: vi.fn(),
}));

vi.mock('../../logging/subsystem.js', () => ({
  createSubsystemLogger: vi.fn(() => mockLogger),
}));

function workstationSnapshot(): ReportSnapshot {
  return emptySnapshot({
    runTime: 3600,
    iterations: 720,
    memory: memoryCategory(
      [stat(['DDR5', 'Used'], 'Used', 2.5, 14, 8)],
      ['TEST-DIMM-16G', 'TEST-DIMM-16G'],
    ),
    cpuFrequency: cpuFrequencyCategory([stat(['cpu', 'Core 0'], 'Core 0', 800, 4800, 3600)]),
    cpuUsage: cpuUsageCategory([stat(['cpu', 'Core 0'], 'Core 0', 2, 99, 60)]),
    cpuTemperature: cpuTemperatureCategory([stat(['coretemp', 'Core 0'], 'Core 0', 35, 88, 61.5)]),
  });
}

const WORKSTATION_SUMMARY = [
  'Summary:',
  'Model: TestBox',
  'Start Time: 2024-07-30 12:00:00',
  'Runtime: 3600',
  'CPU: Test CPU 8-Core',
  'Memory SKUs:',
  'DIMM: TEST-DIMM-16G',
  'DIMM: TEST-DIMM-16G',
  'DDR5                            Min                 Max                Mean',
  'Used                            2.5                  14                   8',
  '',
  'Core                 Min %:Mhz      Max %:Mhz     Mean %:Mhz',
  'Core 0                 2:  800       99: 4800       60: 3600',
  '',
  'Core                Min C     Max C    Mean C',
  'Core 0                 35        88      61.5',
  '',
  '',
].join('\n');

describe('renderPreamble', () => {
  it('should list the model, timing, CPU and every DIMM', () => {
    expect(renderPreamble(workstationSnapshot())).toBe(
      'Summary:\nModel: TestBox\nStart Time: 2024-07-30 12:00:00\nRuntime: 3600\n' +
      'CPU: Test CPU 8-Core\nMemory SKUs:\nDIMM: TEST-DIMM-16G\nDIMM: TEST-DIMM-16G\n',
    );
  });

  it('should still print the SKU heading with no DIMMs', () => {
    expect(renderPreamble(emptySnapshot())).toBe(
      'Summary:\nModel: TestBox\nStart Time: 2024-07-30 12:00:00\nRuntime: 0\nCPU: Test CPU 8-Core\nMemory SKUs:\n',
    );
  });
});

describe('buildSummary', () => {
  it('should render the preamble followed by present categories', () => {
    expect(buildSummary(workstationSnapshot())).toBe(WORKSTATION_SUMMARY);
  });

  it('should order sections memory, CPU, temperature, power, fans, GPUs, drives', () => {
    const snapshot = emptySnapshot({
      memory: memoryCategory([stat(['DDR4', 'Used'], 'Used', 1, 2, 1.5)]),
      cpuFrequency: cpuFrequencyCategory([stat(['cpu', 'Core 0'], 'Core 0', 800, 4800, 3600)]),
      cpuTemperature: cpuTemperatureCategory([stat(['k10temp', 'Tctl'], 'Tctl', 40, 90, 70)]),
      fans: fanCategory([stat(['it87', 'fan1'], 'fan1', 1, 2, 1.5, 2)]),
      gpus: gpuCategory([stat(['amdgpu', 'iGPU', 'temp'], 'temp', 1, 2, 1.5, 2)]),
      drives: driveCategory([stat(['nvme0', 'Composite'], 'Composite', 1, 2, 1.5, 2)], { nvme0: 'Test NVMe' }),
    });

    const headers = buildReportSections(snapshot).map(section => section.layout.headers[0]);

    expect(headers).toEqual(['DDR4', 'Core', 'Core', 'Fan', 'Data', 'Data']);
  });

  it('should contain only the preamble when no hardware was sampled', () => {
    const snapshot = emptySnapshot();

    expect(buildSummary(snapshot)).toBe(renderPreamble(snapshot));
  });
});

describe('writeSummary', () => {
  let workDir: string;

  beforeEach(() => {
    vi.clearAllMocks();
    workDir = mkdtempSync(join(tmpdir(), 'stress-report-'));
  });

  afterEach(() => {
    rmSync(workDir, { recursive: true, force: true });
  });

  it('should write the summary text and leave no temporary file', () => {
    const summaryPath = join(workDir, 'summary.txt');

    writeSummary(workstationSnapshot(), summaryPath);

    expect(readFileSync(summaryPath, 'utf8')).toBe(WORKSTATION_SUMMARY);
    expect(existsSync(`${summaryPath}.tmp`)).toBe(false);
    expect(mockLogger.info).toHaveBeenCalledWith('Summary report written', {
      path: summaryPath,
      sections: 3,
      iterations: 720,
    });
  });

  it('should remove the temporary file when the rename fails', () => {
    const summaryPath = join(workDir, 'summary.txt');
    mkdirSync(summaryPath);
    writeFileSync(join(summaryPath, 'entry'), 'x');

    expect(() => writeSummary(emptySnapshot(), summaryPath)).toThrow(ReportIOError);
    expect(existsSync(`${summaryPath}.tmp`)).toBe(false);
    expect(mockLogger.error).toHaveBeenCalledWith(
      'Failed to write summary report',
      expect.objectContaining({ path: summaryPath }),
    );
  });

  it('should overwrite an earlier report', () => {
    const summaryPath = join(workDir, 'summary.txt');
    writeFileSync(summaryPath, 'stale report contents that are longer than the new one'.repeat(100));

    writeSummary(emptySnapshot(), summaryPath);

    expect(readFileSync(summaryPath, 'utf8')).toBe(renderPreamble(emptySnapshot()));
  });

  it('should raise an IOFailure when the path cannot be written', () => {
    const summaryPath = join(workDir, 'missing', 'summary.txt');

    expect(() => writeSummary(emptySnapshot(), summaryPath)).toThrow(ReportIOError);
    try {
      writeSummary(emptySnapshot(), summaryPath);
    } catch (error) {
      expect(error).toBeInstanceOf(ReportIOError);
      if (error instanceof ReportIOError) {
        expect(error.kind).toBe('IOFailure');
        expect(error.path).toBe(summaryPath);
        expect(error.operation).toBe('write');
      }
    }
  });
});
