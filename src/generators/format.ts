/**
 * Cell and value formatting shared by the Markdown reports and highlight messages.
 */

export function formatNumber(value: number): string {
  return value.toLocaleString('en-US');
}

export function formatPeriod(year: number, quarter: number): string {
  return `${year}-Q${quarter}`;
}

/**
 * Make free text safe inside a Markdown table cell.
 * Pipes are escaped and line breaks collapse to a single space.
 */
export function escapeCell(text: string): string {
  return text.replace(/\|/g, '\\|').replace(/\r?\n|\r/g, ' ');
}
