/**
 * Column layouts for each report category.
 */

import type { CellValue, Justification } from '../line-formatter/index.js';

export interface SectionLayout {
  headers: readonly CellValue[];
  widths: readonly number[];
  justifications: readonly Justification[];
}

const STAT_JUSTIFICATIONS: readonly Justification[] = ['left', 'right', 'right', 'right'];
const CURRENT_STAT_JUSTIFICATIONS: readonly Justification[] = ['left', 'right', 'right', 'right', 'right'];

/** Memory headers name the memory type in the first column */
export function memoryLayout(memoryType: string): SectionLayout {
  return {
    headers: [memoryType, 'Min', 'Max', 'Mean'],
    widths: [15, 20, 20, 20],
    justifications: STAT_JUSTIFICATIONS,
  };
}

export const CPU_LAYOUT: SectionLayout = {
  headers: ['Core', 'Min %:Mhz', 'Max %:Mhz', 'Mean %:Mhz'],
  widths: [15, 15, 15, 15],
  justifications: STAT_JUSTIFICATIONS,
};

export const CPU_TEMPERATURE_LAYOUT: SectionLayout = {
  headers: ['Core', 'Min C', 'Max C', 'Mean C'],
  widths: [15, 10, 10, 10],
  justifications: STAT_JUSTIFICATIONS,
};

export const POWER_LAYOUT: SectionLayout = {
  headers: ['CPU', 'Min W', 'Max W', 'Mean W'],
  widths: [15, 10, 10, 10],
  justifications: STAT_JUSTIFICATIONS,
};

export const FAN_LAYOUT: SectionLayout = {
  headers: ['Fan', 'Current(RPM)', 'Min(RPM)', 'Max(RPM)', 'Mean(RPM)'],
  widths: [15, 15, 15, 15, 15],
  justifications: CURRENT_STAT_JUSTIFICATIONS,
};

export const DEVICE_DATA_LAYOUT: SectionLayout = {
  headers: ['Data', 'Current', 'Min', 'Max', 'Mean'],
  widths: [15, 15, 15, 15, 15],
  justifications: CURRENT_STAT_JUSTIFICATIONS,
};
