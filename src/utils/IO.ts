// IO.ts - Load typed tables from CSV text and write them back

import fs from 'fs';
import { parse } from 'csv-parse/sync';
import { type DataValue, formatValue, isNumericToken, parseValue } from '../core/DataValue';
import { IOError, type KNNError, type Result, SchemaError, fail, ok } from '../core/Errors';
import { TypedTable, type TypedTableOptions } from '../core/TypedTable';

export type LoadOptions = TypedTableOptions;

function isStringMatrix(value: unknown): value is string[][] {
    return Array.isArray(value) && value.every(row => Array.isArray(row) && row.every(cell => typeof cell === 'string'));
}

function report<T>(error: KNNError, verbose: boolean | undefined): Result<T> {
    if (verbose ?? true) console.error(`❌ ${error.message}`);
    return fail(error);
}

/**
 * Parse comma-separated text into a typed table. The first line names the
 * columns; the second line decides which columns are numeric for every row.
 * Quotes are not interpreted, so fields cannot contain commas.
 */
export function parseTable(text: string, options: LoadOptions = {}): Result<TypedTable> {
    let records: unknown;
    try {
        records = parse(text.replace(/\r\n/g, '\n'), { bom: true, quote: false, skip_empty_lines: true });
    } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        return report(new SchemaError(`failed to parse CSV: ${message}`), options.verbose);
    }
    if (!isStringMatrix(records) || records.length === 0) {
        return report(new SchemaError('CSV has no header line'), options.verbose);
    }

    const [header, ...lines] = records;
    const first = lines[0];
    const numeric = header.map((_, i) => first !== undefined && isNumericToken(first[i] ?? ''));

    const created = TypedTable.create(
        header.map((name, i) => ({ name, numeric: numeric[i] })),
        { ...options, label: undefined }
    );
    if (!created.success) return created;
    const table = created.data;

    for (let r = 0; r < lines.length; r++) {
        const line = lines[r];
        const bad = line.findIndex((token, i) => numeric[i] && !isNumericToken(token));
        if (bad !== -1) {
            return report(new SchemaError(`line ${r + 2}: \`${line[bad]}\` is not numeric in column \`${header[bad]}\``, {
                line: r + 2,
                attribute: header[bad],
            }), options.verbose);
        }
        const row: DataValue[] = line.map((token, i) => parseValue(token, numeric[i]));
        const pushed = table.pushBack(row);
        if (!pushed.success) return fail(pushed.error);
    }

    if (options.label) {
        const labelled = table.setLabel(options.label);
        if (!labelled.success) return fail(labelled.error);
    }
    return ok(table);
}

/**
 * Read a CSV file into a typed table. An unreadable path is an IOError;
 * `TypedTable.empty()` is the neutral table to fall back to.
 */
export function loadTable(path: string, options: LoadOptions = {}): Result<TypedTable> {
    let text: string;
    try {
        text = fs.readFileSync(path, 'utf8');
    } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        return report(new IOError(path, `no such file or the path is incorrect (${message})`), options.verbose);
    }
    return parseTable(text, options);
}

export function formatTable(table: TypedTable): string {
    const lines = [table.attributes().join(',')];
    for (const row of table.rows()) {
        lines.push(row.map(formatValue).join(','));
    }
    return lines.join('\n') + '\n';
}

export function serializeTable(table: TypedTable, path: string): Result<void> {
    try {
        fs.writeFileSync(path, formatTable(table), 'utf8');
    } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        return report(new IOError(path, `could not write table (${message})`), table.verbose);
    }
    return ok(undefined);
}
