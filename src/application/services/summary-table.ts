import { ExportResult } from '../../domain/entities/export-result.entity';

const HEADERS = ['#', 'Page', 'Outcome', 'Detail'] as const;
const MAX_CELL_WIDTH = 80;

function truncate(value: string): string {
  return value.length > MAX_CELL_WIDTH ? `${value.slice(0, MAX_CELL_WIDTH - 1)}…` : value;
}

function toRow(result: ExportResult, index: number): string[] {
  const detail = ExportResult.isSuccess(result)
    ? result.filePath
    : `${result.error.cause}: ${result.error.message}`;

  return [
    String(index + 1),
    truncate(result.pageUrl),
    result.outcome,
    truncate(detail),
  ];
}

/**
 * Renders the per-page outcome of a batch as a fixed-width text table
 * followed by a totals line.
 */
export function renderSummaryTable(results: ReadonlyArray<ExportResult>): string {
  const rows = results.map(toRow);
  const widths = HEADERS.map((header, column) =>
    Math.max(header.length, ...rows.map((row) => row[column].length)),
  );

  const line = (cells: ReadonlyArray<string>) =>
    cells
      .map((cell, column) => cell.padEnd(widths[column]))
      .join(' | ')
      .trimEnd();
  const separator = widths.map((width) => '-'.repeat(width)).join('-+-');

  const succeeded = results.filter(ExportResult.isSuccess).length;
  const totals = `${succeeded} succeeded, ${results.length - succeeded} failed`;

  return [line(HEADERS), separator, ...rows.map(line), '', totals].join('\n');
}
