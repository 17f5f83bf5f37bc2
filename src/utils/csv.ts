import type { CsvValue, ReportTable } from '../services/reporting/types.js';

function formatCell(value: CsvValue): string {
  if (value === null || value === undefined) {
    return '';
  }
  const text = String(value);
  if (/[",\r\n]/.test(text)) {
    return `"${text.replace(/"/g, '""')}"`;
  }
  return text;
}

export function renderCsv(table: ReportTable): string {
  const lines = [table.columns.map(formatCell).join(',')];
  for (const row of table.rows) {
    lines.push(table.columns.map((column) => formatCell(row[column])).join(','));
  }
  return `${lines.join('\n')}\n`;
}
