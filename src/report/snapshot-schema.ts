/**
 * Report Snapshot Schema
 *
 * Validates a snapshot handed over as plain data (for example JSON
 * written by the sampling process) and fills in the optional parts.
 */

import { z } from 'zod';
import { ReportDataError } from './errors.js';
import type { CategoryKind, ReportSnapshot } from './types/index.js';

export const statRecordSchema = z.object({
  key: z.array(z.string()).min(1),
  label: z.string(),
  current: z.number().nullable().default(null),
  min: z.number(),
  max: z.number(),
  mean: z.number(),
});

function categorySchema<K extends CategoryKind>(kind: K) {
  return z.object({
    kind: z.literal(kind).optional().transform((): K => kind),
    isEmpty: z.boolean().default(false),
    records: z.array(statRecordSchema).default([]),
  });
}

const gpuDeviceSchema = z.object({
  vendor: z.string(),
  name: z.string(),
  subsystem: z.string().nullable().default(null),
});

export const reportSnapshotSchema = z.object({
  startTime: z.string(),
  runTime: z.number().nonnegative(),
  iterations: z.number().int().nonnegative(),
  modelName: z.string(),
  memory: categorySchema('memory').extend({
    skus: z.array(z.string()).default([]),
  }),
  cpuFrequency: categorySchema('cpuFrequency').extend({
    model: z.string(),
  }),
  cpuUsage: categorySchema('cpuUsage'),
  cpuTemperature: categorySchema('cpuTemperature'),
  power: categorySchema('power'),
  fans: categorySchema('fans'),
  gpus: categorySchema('gpus').extend({
    driverVersion: z.string().nullable().default(null),
    devices: z.array(gpuDeviceSchema).default([]),
  }),
  drives: categorySchema('drives').extend({
    models: z.record(z.string()).default({}),
  }),
});

export function parseReportSnapshot(input: unknown): ReportSnapshot {
  const result = reportSnapshotSchema.safeParse(input);
  if (!result.success) {
    throw new ReportDataError(
      result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
    );
  }
  return result.data;
}
