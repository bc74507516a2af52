import { describe, it, expect } from 'vitest';
import { parseReportSnapshot } from './snapshot-schema.js';
import { ReportDataError } from './errors.js';
import { buildSummary } from './report-assembler/index.js';

const minimalSnapshot = {
  startTime: '2024-07-30 12:00:00',
  runTime: 60,
  iterations: 12,
  modelName: 'TestBox',
  memory: { skus: ['TEST-DIMM-8G'] },
  cpuFrequency: {
    model: 'Test CPU',
    records: [{ key: ['cpu', 'Core 0'], label: 'Core 0', min: 800, max: 4800, mean: 3600 }],
  },
  cpuUsage: {},
  cpuTemperature: { isEmpty: true },
  power: {},
  fans: {},
  gpus: {},
  drives: { models: { nvme0: 'Test NVMe' } },
};

describe('parseReportSnapshot', () => {
  it('should fill in category tags and optional fields', () => {
    const snapshot = parseReportSnapshot(minimalSnapshot);

    expect(snapshot.memory).toEqual({ kind: 'memory', isEmpty: false, records: [], skus: ['TEST-DIMM-8G'] });
    expect(snapshot.cpuFrequency.records[0].current).toBeNull();
    expect(snapshot.cpuTemperature.isEmpty).toBe(true);
    expect(snapshot.gpus).toEqual({ kind: 'gpus', isEmpty: false, records: [], driverVersion: null, devices: [] });
    expect(snapshot.drives.models).toEqual({ nvme0: 'Test NVMe' });
  });

  it('should produce a snapshot the assembler can render', () => {
    const summary = buildSummary(parseReportSnapshot(minimalSnapshot));

    expect(summary.startsWith('Summary:\nModel: TestBox\n')).toBe(true);
    expect(summary).toContain('DIMM: TEST-DIMM-8G\n');
    expect(summary.endsWith('Core 0                 -:  800        -: 4800        -: 3600\n\n')).toBe(true);
  });

  it('should report every invalid field', () => {
    const invalid = {
      ...minimalSnapshot,
      runTime: -1,
      cpuFrequency: { records: [{ key: [], label: 'Core 0', min: 'fast', max: 1, mean: 1 }] },
    };

    try {
      parseReportSnapshot(invalid);
      expect.unreachable('parseReportSnapshot should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(ReportDataError);
      if (error instanceof ReportDataError) {
        expect(error.kind).toBe('InvalidSnapshot');
        expect(error.issues.map(issue => issue.split(':')[0])).toEqual([
          'runTime',
          'cpuFrequency.records.0.key',
          'cpuFrequency.records.0.min',
          'cpuFrequency.model',
        ]);
      }
    }
  });

  it('should reject non-object input', () => {
    expect(() => parseReportSnapshot('not a snapshot')).toThrow(ReportDataError);
  });
});
