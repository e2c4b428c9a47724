// CSV, Markdown and JSON writers for holdings reports

import * as fs from 'fs/promises';
import * as path from 'path';
import { HOLDING_FIELDS, NUMERIC_HOLDING_FIELDS } from './portfolio.js';
import type { AccountHoldingRow, HoldingRecord } from './types.js';

export type Cell = string | number;

const formatCell = (cell: Cell): string => (typeof cell === 'number' ? String(cell) : cell);

function escapeCsvCell(cell: Cell): string {
    const value = formatCell(cell);
    if (/[",\r\n]/.test(value)) {
        return `"${value.replace(/"/g, '""')}"`;
    }
    return value;
}

/**
 * RFC 4180 style CSV: quoted only when needed, LF line endings, trailing newline.
 */
export function formatCsv(headers: readonly string[], rows: readonly (readonly Cell[])[]): string {
    const lines = [headers, ...rows].map((row) => row.map(escapeCsvCell).join(','));
    return lines.join('\n') + '\n';
}

function holdingRow(record: HoldingRecord): Cell[] {
    return HOLDING_FIELDS.map((field) => record[field]);
}

export function holdingsToCsv(records: readonly HoldingRecord[]): string {
    return formatCsv(HOLDING_FIELDS, records.map(holdingRow));
}

export const ACCOUNT_ROW_HEADERS = ['Account Name', 'Type', 'Holding', 'Value'] as const;

export function accountRowsToCsv(rows: readonly AccountHoldingRow[]): string {
    return formatCsv(ACCOUNT_ROW_HEADERS, rows.map((row) => [row.accountName, row.accountType, row.holding, row.value]));
}

const escapeMarkdownCell = (value: string): string => value.replace(/\|/g, '\\|').replace(/\r?\n/g, ' ');

// Width in code points, so astral characters count once
const cellWidth = (value: string): number => [...value].length;

/**
 * Markdown pipe table. Columns are padded to their widest cell; numeric columns are right-aligned.
 */
export function formatMarkdownTable(
    headers: readonly string[],
    rows: readonly (readonly Cell[])[],
    rightAligned: ReadonlySet<number> = new Set<number>()
): string {
    const cells = rows.map((row) => row.map((cell) => escapeMarkdownCell(formatCell(cell))));
    const headerCells = headers.map(escapeMarkdownCell);

    const widths = headerCells.map((header, i) =>
        Math.max(3, cellWidth(header), ...cells.map((row) => cellWidth(row[i] ?? '')))
    );

    const pad = (value: string, i: number): string => {
        const fill = ' '.repeat(widths[i] - cellWidth(value));
        return rightAligned.has(i) ? fill + value : value + fill;
    };
    const line = (row: string[]): string => `| ${row.map((value, i) => pad(value, i)).join(' | ')} |`;

    const separator = widths.map((width, i) =>
        rightAligned.has(i) ? `${'-'.repeat(width - 1)}:` : '-'.repeat(width)
    );

    return [line(headerCells), `| ${separator.join(' | ')} |`, ...cells.map(line)].join('\n') + '\n';
}

export function holdingsToMarkdown(records: readonly HoldingRecord[]): string {
    const numericColumns = new Set<number>();
    HOLDING_FIELDS.forEach((field, i) => {
        if (NUMERIC_HOLDING_FIELDS.has(field)) numericColumns.add(i);
    });
    return formatMarkdownTable(HOLDING_FIELDS, records.map(holdingRow), numericColumns);
}

/**
 * Write a text file, creating parent directories as needed.
 */
export async function writeTextFile(filePath: string, contents: string): Promise<void> {
    const dir = path.dirname(filePath);
    if (dir && dir !== '.') {
        await fs.mkdir(dir, { recursive: true });
    }
    await fs.writeFile(filePath, contents, 'utf-8');
}

export async function writePortfolioJson(filePath: string, data: unknown): Promise<void> {
    await writeTextFile(filePath, JSON.stringify(data, null, 4) + '\n');
}
