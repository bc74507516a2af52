/**
 * Line Formatter
 *
 * Renders one row of values into fixed-width, justified columns.
 */

export type Justification = 'left' | 'right' | 'center';

export type CellValue = string | number | null;

/** Placeholder for a cell whose value was never sampled */
export const ABSENT_CELL = '-';

export function cellText(value: CellValue): string {
  return value === null ? ABSENT_CELL : String(value);
}

/**
 * Pads text to the column width. Text already at or over the width is
 * left untouched; centering puts the odd space on the right.
 */
export function justify(text: string, width: number, justification: Justification): string {
  const padding = width - text.length;
  if (padding <= 0) {
    return text;
  }

  switch (justification) {
    case 'left':
      return text.padEnd(width);
    case 'right':
      return text.padStart(width);
    case 'center': {
      const left = Math.floor(padding / 2);
      return ' '.repeat(left) + text + ' '.repeat(padding - left);
    }
  }
}

/**
 * Formats a single line. Values, widths and justifications are consumed
 * pairwise; the shortest list decides how many columns are written.
 *
 * @example
 * formatLine(['Name', 'Age', 'City'], [10, 5, 15], ['left', 'right', 'center'])
 * // 'Name        Age     City      \n'
 */
export function formatLine(
  values: readonly CellValue[],
  widths: readonly number[],
  justifications: readonly Justification[],
): string {
  const columns = Math.min(values.length, widths.length, justifications.length);
  let line = '';
  for (let i = 0; i < columns; i++) {
    line += justify(cellText(values[i]), widths[i], justifications[i]);
  }
  return line + '\n';
}
