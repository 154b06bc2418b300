/**
 * Data Ingestion Skill
 * Reads a CSV or Excel statement of financial line items and maps it to metrics
 */

import { readFile } from 'fs/promises';
import * as path from 'path';
import { parse } from 'csv-parse/sync';
import * as XLSX from 'xlsx';
import { logger } from '../../utils/logger';
import { IngestionError, errorMessage } from '../../agent-core/errors';
import type { MetricId, RawFinancialMetrics } from '../../protocol';

export type Cell = string | number;
export type Table = Cell[][];

const METRIC_COLUMN_KEYWORDS = ['metric', 'item', 'description', 'particulars', 'details'];
const AMOUNT_COLUMN_KEYWORDS = ['amount', 'value', 'ngn', 'total', 'cost'];

// Tried in order; the first keyword that hits a row wins
export const METRIC_KEYWORDS: Record<MetricId, string[]> = {
    total_revenue: ['total revenue', 'revenue', 'turnover', 'sales'],
    cost_of_sales: ['cost of sales', 'cost of goods sold', 'cogs', 'direct cost'],
    operating_expenses: ['operating expenses', 'opex', 'operating costs', 'administrative expenses'],
    profit_tax_paid: ['profit tax paid', 'cit paid', 'tax paid'],
    output_vat: ['output vat', 'vat collected', 'vat on sales'],
    input_vat: ['input vat', 'vat paid on inputs', 'vat on purchases']
};

// Specific labels first so "Cost of Sales" is not read as revenue
const EXTRACTION_ORDER: MetricId[] = [
    'cost_of_sales',
    'operating_expenses',
    'profit_tax_paid',
    'output_vat',
    'input_vat',
    'total_revenue'
];

export const SUPPORTED_EXTENSIONS = ['.csv', '.xlsx', '.xls'] as const;

// Upload limits; a statement of line items is far smaller than either
export const MAX_UPLOAD_BYTES = 5 * 1024 * 1024;
export const MAX_ROWS = 5_000;

// .xlsx is a ZIP package, legacy .xls an OLE compound file
const WORKBOOK_SIGNATURES: Record<'.xlsx' | '.xls', number[]> = {
    '.xlsx': [0x50, 0x4b, 0x03, 0x04],
    '.xls': [0xd0, 0xcf, 0x11, 0xe0, 0xa1, 0xb1, 0x1a, 0xe1]
};

function hasSignature(buffer: Buffer, signature: number[]): boolean {
    return buffer.length >= signature.length && signature.every((byte, index) => buffer[index] === byte);
}

export interface IngestionResult {
    metrics: RawFinancialMetrics;
    matchedLabels: Partial<Record<MetricId, string>>;
    table: Table;
    tableText: string;
}

/**
 * Parse an amount cell: numbers pass through, strings may carry ₦, NGN and commas
 */
export function parseAmount(cell: Cell, label: string): number {
    if (typeof cell === 'number') {
        if (!Number.isFinite(cell)) {
            throw new IngestionError(`Amount for "${label}" is not a finite number`);
        }
        return cell;
    }

    const cleaned = cell.replace(/₦|ngn|,|\s/gi, '');
    const value = cleaned === '' ? NaN : Number(cleaned);
    if (!Number.isFinite(value)) {
        throw new IngestionError(`Amount for "${label}" is not numeric: "${cell}"`);
    }
    return value;
}

function findColumn(header: Cell[], keywords: string[], exclude?: number): number {
    return header.findIndex((cell, index) => {
        if (index === exclude) return false;
        const name = String(cell).toLowerCase();
        return keywords.some(keyword => name.includes(keyword));
    });
}

/**
 * Map a table (header row first) to raw metrics by keyword matching
 */
export function extractMetrics(table: Table): Pick<IngestionResult, 'metrics' | 'matchedLabels'> {
    const [header, ...rows] = table;
    if (!header) {
        throw new IngestionError('The file is empty');
    }

    const metricCol = findColumn(header, METRIC_COLUMN_KEYWORDS);
    const amountCol = findColumn(header, AMOUNT_COLUMN_KEYWORDS, metricCol);
    if (metricCol < 0 || amountCol < 0) {
        throw new IngestionError(
            "Could not identify the Metric or Amount columns in the file. Label one column like 'Metric' or 'Description' and another like 'Amount' or 'NGN'."
        );
    }

    const metrics: RawFinancialMetrics = {};
    const matchedLabels: Partial<Record<MetricId, string>> = {};
    const claimed = new Set<number>();

    for (const metric of EXTRACTION_ORDER) {
        for (const keyword of METRIC_KEYWORDS[metric]) {
            const rowIndex = rows.findIndex((row, index) =>
                !claimed.has(index) && String(row[metricCol] ?? '').toLowerCase().includes(keyword)
            );
            if (rowIndex < 0) continue;

            const row = rows[rowIndex];
            const label = String(row[metricCol]).trim();
            metrics[metric] = parseAmount(row[amountCol] ?? '', label);
            matchedLabels[metric] = label;
            claimed.add(rowIndex);
            break;
        }
    }

    if (metrics.total_revenue === undefined) {
        logger.warn('[Ingestion] No revenue row found', { header: header.map(String) });
    }

    return { metrics, matchedLabels };
}

/**
 * Plain-text rendering of the table for the advisory prompt
 */
export function renderTable(table: Table): string {
    return table.map(row => row.map(cell => String(cell)).join(' | ')).join('\n');
}

function normalizeRow(row: unknown[]): Cell[] {
    return row.map(cell => {
        if (typeof cell === 'number') return cell;
        if (cell === null || cell === undefined) return '';
        return String(cell).trim();
    });
}

function isBlank(row: Cell[]): boolean {
    return row.every(cell => cell === '');
}

export class DataIngestor {
    /**
     * Parse a buffer given its file extension
     */
    parseTable(buffer: Buffer, extension: string): Table {
        const ext = extension.toLowerCase();
        if (buffer.length > MAX_UPLOAD_BYTES) {
            throw new IngestionError(`File is too large (${buffer.length} bytes); the limit is ${MAX_UPLOAD_BYTES} bytes`);
        }

        const table = this.readRows(buffer, ext, extension).map(normalizeRow).filter(row => !isBlank(row));
        if (table.length > MAX_ROWS) {
            throw new IngestionError(`Statement has more than ${MAX_ROWS} rows`);
        }
        return table;
    }

    private readRows(buffer: Buffer, ext: string, extension: string): unknown[][] {
        try {
            switch (ext) {
                case '.csv': {
                    const records: string[][] = parse(buffer, {
                        skip_empty_lines: true,
                        trim: true,
                        relax_column_count: true,
                        bom: true,
                        to: MAX_ROWS + 1
                    });
                    return records;
                }
                case '.xlsx':
                case '.xls': {
                    const signature = ext === '.xlsx' ? WORKBOOK_SIGNATURES['.xlsx'] : WORKBOOK_SIGNATURES['.xls'];
                    if (!hasSignature(buffer, signature)) {
                        throw new IngestionError(`File does not look like an Excel ${ext} workbook`);
                    }
                    // Values only: formulas, HTML and styles are never read
                    const workbook = XLSX.read(buffer, {
                        type: 'buffer',
                        cellFormula: false,
                        cellHTML: false,
                        cellStyles: false,
                        sheetRows: MAX_ROWS + 1
                    });
                    const sheetName = workbook.SheetNames[0];
                    const sheet = sheetName ? workbook.Sheets[sheetName] : undefined;
                    if (!sheet) return [];
                    return XLSX.utils.sheet_to_json<unknown[]>(sheet, {
                        header: 1,
                        blankrows: false,
                        defval: ''
                    });
                }
                default:
                    throw new IngestionError(
                        `Unsupported file format "${extension}". Please use a .csv or .xlsx file.`
                    );
            }
        } catch (error) {
            if (error instanceof IngestionError) throw error;
            throw new IngestionError(`Failed to parse ${ext} data: ${errorMessage(error)}`);
        }
    }

    ingestBuffer(buffer: Buffer, extension: string): IngestionResult {
        const table = this.parseTable(buffer, extension);
        const { metrics, matchedLabels } = extractMetrics(table);

        logger.info('[Ingestion] Extracted metrics', { rows: table.length, matched: Object.keys(matchedLabels) });

        return { metrics, matchedLabels, table, tableText: renderTable(table) };
    }

    async ingestFile(filePath: string): Promise<IngestionResult> {
        const extension = path.extname(filePath);
        if (!SUPPORTED_EXTENSIONS.some(ext => ext === extension.toLowerCase())) {
            throw new IngestionError(
                `Unsupported file format "${extension || filePath}". Please use a .csv or .xlsx file.`
            );
        }

        let buffer: Buffer;
        try {
            buffer = await readFile(filePath);
        } catch (error) {
            throw new IngestionError(`Could not read ${filePath}: ${errorMessage(error)}`);
        }

        return this.ingestBuffer(buffer, extension);
    }
}

export const dataIngestor = new DataIngestor();
