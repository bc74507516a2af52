/**
 * StatRecord Interface
 *
 * One aggregated statistic for one entity (core, fan, GPU metric, drive
 * sensor, memory figure) over a stress-test run.
 */

export interface StatRecord {
  /**
   * Positional grouping key. The first field is the discriminator used to
   * split a category into sections (fan driver, GPU vendor, drive device id,
   * memory type); GPU records carry the device name in the second field.
   */
  key: readonly string[];
  /** Entity name shown in the first column */
  label: string;
  /** Latest live sample, or null when the metric is only aggregated */
  current: number | null;
  min: number;
  max: number;
  mean: number;
}
