// TypedTable.ts - Column-oriented table with fixed column types, a label and normalization parameters

import type { DataValue } from './DataValue';
import { BoundsError, type KNNError, type Result, SchemaError, fail, ok } from './Errors';
import { type Normalizer, defaultNormalizer } from './Normalizer';

export interface ColumnSpec {
    name: string;
    numeric: boolean;
}

export interface TypedTableOptions {
    label?: string;
    normalizer?: Normalizer;
    verbose?: boolean;
}

export interface NormalizationBounds {
    min: number;
    max: number;
}

export interface SplitResult {
    train: TypedTable;
    test: TypedTable;
}

export class TypedTable {
    private keys: string[];
    private numericFlags: boolean[];
    private data: Map<string, DataValue[]>;
    private size = 0;
    private label = '';
    private params = new Map<string, number>();
    private normalized = false;

    public normalizer: Normalizer;
    public verbose: boolean;

    private constructor(columns: ColumnSpec[], options: TypedTableOptions = {}) {
        this.keys = columns.map(c => c.name);
        this.numericFlags = columns.map(c => c.numeric);
        this.data = new Map();
        for (const key of this.keys) this.data.set(key, []);
        this.normalizer = options.normalizer ?? defaultNormalizer;
        this.verbose = options.verbose ?? true;
    }

    /**
     * Build an empty table with a fixed schema. Column names must be unique,
     * and `options.label`, when given, must name one of them.
     */
    static create(columns: ColumnSpec[], options: TypedTableOptions = {}): Result<TypedTable> {
        const seen = new Set<string>();
        for (const { name } of columns) {
            if (seen.has(name)) {
                return fail(new SchemaError(`duplicate attribute \`${name}\``, { attribute: name }));
            }
            seen.add(name);
        }

        const table = new TypedTable(columns, options);
        if (options.label) {
            const labelled = table.setLabel(options.label);
            if (!labelled.success) return fail(labelled.error);
        }
        return ok(table);
    }

    /**
     * Build a table from row-major data. Column types come from the first row:
     * a number makes the column numeric. Without rows every column is categorical.
     */
    static fromRows(columns: string[], rows: DataValue[][], options: TypedTableOptions = {}): Result<TypedTable> {
        const first = rows[0];
        const specs = columns.map((name, i) => ({
            name,
            numeric: first !== undefined && typeof first[i] === 'number',
        }));
        const created = TypedTable.create(specs, options);
        if (!created.success) return created;

        const table = created.data;
        for (const row of rows) {
            const pushed = table.pushBack(row);
            if (!pushed.success) return fail(pushed.error);
        }
        return ok(table);
    }

    /**
     * A schema-less table, the neutral value after a failed load.
     */
    static empty(): TypedTable {
        return new TypedTable([]);
    }

    get rowCount(): number {
        return this.size;
    }

    isEmpty(): boolean {
        return this.keys.length === 0 || this.size === 0;
    }

    attributes(): string[] {
        return [...this.keys];
    }

    columnSpecs(): ColumnSpec[] {
        return this.keys.map((name, i) => ({ name, numeric: this.numericFlags[i] }));
    }

    hasAttribute(attribute: string): boolean {
        return this.data.has(attribute);
    }

    columnIndex(attribute: string): number {
        return this.keys.indexOf(attribute);
    }

    isNumericColumn(attribute: string): boolean {
        const i = this.columnIndex(attribute);
        return i !== -1 && this.numericFlags[i];
    }

    numerics(): string[] {
        return this.keys.filter((_, i) => this.numericFlags[i]);
    }

    /** Numeric columns other than the label. */
    featureNumerics(): string[] {
        return this.numerics().filter(key => key !== this.label);
    }

    setLabel(label: string): Result<string> {
        if (!this.hasAttribute(label)) {
            return this.report(new SchemaError(`\`${label}\` not found, current label not changed`, { attribute: label }));
        }
        this.label = label;
        return ok(label);
    }

    getLabel(): Result<string> {
        if (!this.label) {
            return this.report(new SchemaError('no label set yet'));
        }
        return ok(this.label);
    }

    hasLabel(): boolean {
        return this.label.length > 0;
    }

    /** Position of the label column, or -1 when unset. */
    labelIndex(): number {
        return this.label ? this.columnIndex(this.label) : -1;
    }

    column(attribute: string): Result<DataValue[]> {
        const values = this.data.get(attribute);
        if (!values) {
            return this.report(new SchemaError(`attribute \`${attribute}\` not found`, { attribute }));
        }
        return ok([...values]);
    }

    /** Values of a numeric column; empty for unknown or categorical columns. */
    numericColumn(attribute: string): number[] {
        const values = this.data.get(attribute) ?? [];
        return values.filter((v): v is number => typeof v === 'number');
    }

    /** Rewrite every value of a column in place. Used by normalizers. */
    mapColumn(attribute: string, fn: (value: DataValue, row: number) => DataValue): void {
        const values = this.data.get(attribute);
        if (!values) return;
        for (let i = 0; i < values.length; i++) {
            values[i] = fn(values[i], i);
        }
    }

    iterrow(at: number): Result<DataValue[]> {
        if (!Number.isInteger(at) || at < 0 || at >= this.size) {
            return this.report(new BoundsError(`row index ${at} out of range [0, ${this.size})`, { index: at, rowCount: this.size }));
        }
        return ok(this.rowAt(at));
    }

    *rows(): Generator<DataValue[], void, undefined> {
        for (let i = 0; i < this.size; i++) {
            yield this.rowAt(i);
        }
    }

    pushBack(row: readonly DataValue[]): Result<number> {
        if (row.length !== this.keys.length) {
            return this.report(new SchemaError(`row has ${row.length} values, expected ${this.keys.length}`, {
                expected: this.keys.length,
                received: row.length,
            }));
        }
        const mismatch = this.keys.findIndex((_, i) => (typeof row[i] === 'number') !== this.numericFlags[i]);
        if (mismatch !== -1) {
            return this.report(new SchemaError(`value for \`${this.keys[mismatch]}\` does not match the column type`, {
                attribute: this.keys[mismatch],
            }));
        }

        this.keys.forEach((key, i) => this.data.get(key)?.push(row[i]));
        return ok(++this.size);
    }

    /** Remove one row, keeping the order of the others. */
    remove(at: number): Result<DataValue[]> {
        const row = this.iterrow(at);
        if (!row.success) return row;

        for (const values of this.data.values()) {
            values.splice(at, 1);
        }
        this.size--;
        return row;
    }

    /**
     * Random partition without replacement: `floor(ratio * rowCount)` rows go to
     * `train`, the rest to `test`. Both inherit schema, label, normalizer and
     * any normalization parameters.
     */
    split(ratio = 0.75, random: () => number = Math.random): Result<SplitResult> {
        if (!(ratio >= 0 && ratio <= 1)) {
            return this.report(new BoundsError(`ratio should be >= 0 and <= 1, got ${ratio}`, { ratio }));
        }

        const indices = Array.from({ length: this.size }, (_, i) => i);
        for (let i = indices.length - 1; i > 0; i--) {
            const j = Math.floor(random() * (i + 1));
            [indices[i], indices[j]] = [indices[j], indices[i]];
        }

        const train = this.emptyCopy();
        const test = this.emptyCopy();
        const cut = Math.floor(ratio * this.size);
        indices.forEach((index, i) => {
            const target = i < cut ? train : test;
            target.appendUnchecked(this.rowAt(index));
        });

        return ok({ train, test });
    }

    normalize(): void {
        if (this.normalized && this.verbose) {
            console.warn('⚠️ Table already normalized — parameters will be recomputed from scaled data.');
        }
        this.normalizer.normalize(this);
        this.normalized = true;
    }

    /** Whether normalize() has run; parameters exist for every numeric feature once it has. */
    hasBeenNormalized(): boolean {
        return this.normalized;
    }

    normalizationParams(): ReadonlyMap<string, number> {
        return new Map(this.params);
    }

    setNormalizationBounds(attribute: string, min: number, max: number): void {
        this.params.set(`${attribute} nmin`, min);
        this.params.set(`${attribute} nmax`, max);
    }

    getNormalizationBounds(attribute: string): NormalizationBounds | undefined {
        const min = this.params.get(`${attribute} nmin`);
        const max = this.params.get(`${attribute} nmax`);
        if (min === undefined || max === undefined) return undefined;
        return { min, max };
    }

    /**
     * Scale a raw point with the stored parameters. A point without the label
     * column is accepted and comes back without it.
     */
    renormalize(point: readonly DataValue[]): Result<DataValue[]> {
        if (!this.normalized) {
            return this.report(new SchemaError('table has not been normalized, no parameters to renormalize with'));
        }
        const aligned = this.alignPoint(point);
        if (!aligned.success) return aligned;

        const scaled = this.normalizer.renormalize(this, aligned.data);
        if (point.length < this.keys.length) {
            scaled.splice(this.labelIndex(), 1);
        }
        return ok(scaled);
    }

    /** Whether every numeric feature of the point lies within the stored [nmin, nmax]. */
    isNormalized(point: readonly DataValue[]): boolean {
        const aligned = this.alignPoint(point);
        if (!aligned.success || !this.normalized) return false;

        return this.keys.every((key, i) => {
            const bounds = this.getNormalizationBounds(key);
            const value = aligned.data[i];
            if (!bounds || typeof value !== 'number') return true;
            return value >= bounds.min && value <= bounds.max;
        });
    }

    /**
     * Bring an external point to the table's full column layout. A point one
     * column short is taken to omit the label, and gets a placeholder there.
     */
    alignPoint(point: readonly DataValue[]): Result<DataValue[]> {
        let aligned: DataValue[];
        if (point.length === this.keys.length) {
            aligned = [...point];
        } else if (point.length === this.keys.length - 1 && this.hasLabel()) {
            const at = this.labelIndex();
            const placeholder: DataValue = this.numericFlags[at] ? NaN : '';
            aligned = [...point.slice(0, at), placeholder, ...point.slice(at)];
        } else {
            return this.report(new SchemaError(`point has ${point.length} values, table has ${this.keys.length} columns`, {
                expected: this.keys.length,
                received: point.length,
            }));
        }

        const labelAt = this.labelIndex();
        const mismatch = this.keys.findIndex((_, i) => i !== labelAt && (typeof aligned[i] === 'number') !== this.numericFlags[i]);
        if (mismatch !== -1) {
            return this.report(new SchemaError(`value for \`${this.keys[mismatch]}\` does not match the column type`, {
                attribute: this.keys[mismatch],
            }));
        }
        return ok(aligned);
    }

    private rowAt(at: number): DataValue[] {
        return this.keys.map(key => this.data.get(key)?.[at] ?? '');
    }

    private appendUnchecked(row: DataValue[]): void {
        this.keys.forEach((key, i) => this.data.get(key)?.push(row[i]));
        this.size++;
    }

    private emptyCopy(): TypedTable {
        const copy = new TypedTable(this.columnSpecs(), { normalizer: this.normalizer, verbose: this.verbose });
        copy.label = this.label;
        copy.params = new Map(this.params);
        copy.normalized = this.normalized;
        return copy;
    }

    private report<T>(error: KNNError): Result<T> {
        if (this.verbose) console.error(`❌ ${error.message}`);
        return fail(error);
    }
}
