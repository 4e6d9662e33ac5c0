export type TableCell = string | number;

export interface TableRenderer {
  /** True when rows are drawn by cli-table3. */
  readonly rich: boolean;
  render(headers: string[], rows: TableCell[][]): string;
}

interface GridTable {
  push(...rows: string[][]): number;
  toString(): string;
}

export type GridTableFactory = (headers: string[]) => GridTable;

export class RichTableRenderer implements TableRenderer {
  readonly rich = true;

  constructor(private createTable: GridTableFactory) {}

  render(headers: string[], rows: TableCell[][]): string {
    const table = this.createTable(headers);
    table.push(...rows.map((row) => row.map(String)));
    return table.toString();
  }
}

/**
 * Left-justified columns as wide as the widest header or cell, separated by
 * " | ", with a dashed rule under the header.
 */
export class PlainTableRenderer implements TableRenderer {
  readonly rich = false;

  render(headers: string[], rows: TableCell[][]): string {
    const widths = headers.map((h) => h.length);
    for (const row of rows) {
      row.forEach((cell, i) => {
        widths[i] = Math.max(widths[i] ?? 0, String(cell).length);
      });
    }

    const formatLine = (cells: TableCell[]) =>
      cells.map((cell, i) => String(cell).padEnd(widths[i] ?? 0)).join(' | ');

    const headerLine = formatLine(headers);
    return [
      headerLine,
      '-'.repeat(headerLine.length),
      ...rows.map(formatLine),
    ].join('\n');
  }
}

/**
 * Pick the table strategy once at startup: cli-table3 when it is installed,
 * the plain renderer otherwise.
 */
export async function loadTableRenderer(): Promise<TableRenderer> {
  try {
    const { default: Table } = await import('cli-table3');
    return new RichTableRenderer(
      (head) => new Table({ head, style: { head: [], border: [] } }),
    );
  } catch (error) {
    if (isModuleNotFound(error)) {
      return new PlainTableRenderer();
    }
    throw error;
  }
}

function isModuleNotFound(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    (error.code === 'ERR_MODULE_NOT_FOUND' || error.code === 'MODULE_NOT_FOUND')
  );
}
