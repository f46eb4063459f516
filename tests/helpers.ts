import type { DataValue } from '../src/core/DataValue';
import type { Normalizer } from '../src/core/Normalizer';
import type { Result } from '../src/core/Errors';
import { TypedTable } from '../src/core/TypedTable';

export function unwrap<T>(result: Result<T>): T {
    if (!result.success) throw result.error;
    return result.data;
}

export const pointRows: DataValue[][] = [
    [0, 0, 'A'],
    [1, 1, 'A'],
    [10, 10, 'B'],
];

/** Two numeric features and a label, quiet unless a test turns logging on. */
export function pointTable(rows: DataValue[][] = pointRows): TypedTable {
    return unwrap(TypedTable.fromRows(['x', 'y', 'label'], rows, { label: 'label', verbose: false }));
}

/** Linear congruential generator, for reproducible shuffles. */
export function seededRandom(seed = 42): () => number {
    let state = seed >>> 0;
    return () => {
        state = (Math.imul(state, 1664525) + 1013904223) >>> 0;
        return state / 2 ** 32;
    };
}

/** Shifts numeric feature columns by a fixed offset and counts its calls. */
export class OffsetNormalizer implements Normalizer {
    normalizeCalls = 0;
    renormalizeCalls = 0;

    constructor(private readonly offset: number) { }

    normalize(table: TypedTable): void {
        this.normalizeCalls++;
        for (const column of table.featureNumerics()) {
            table.mapColumn(column, v => (typeof v === 'number' ? v - this.offset : v));
        }
    }

    renormalize(table: TypedTable, point: readonly DataValue[]): DataValue[] {
        this.renormalizeCalls++;
        const features = new Set(table.featureNumerics());
        const keys = table.attributes();
        return point.map((v, i) => (features.has(keys[i]) && typeof v === 'number' ? v - this.offset : v));
    }
}
