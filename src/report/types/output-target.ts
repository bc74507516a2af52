/**
 * Where a run's artifacts land on disk.
 */
export interface OutputTarget {
  /** Append-only per-iteration log */
  csvPath: string;
  /** Summary report, overwritten on each generation */
  summaryPath: string;
}
