// Normalizer.ts - Scaling strategies for numeric table columns

import type { DataValue } from './DataValue';
import type { TypedTable } from './TypedTable';

/**
 * A scaling strategy. `normalize` fits and applies parameters to a whole table
 * in place; `renormalize` applies the stored parameters to one external point
 * already aligned to the table's columns, returning a new point.
 */
export interface Normalizer {
    normalize(table: TypedTable): void;
    renormalize(table: TypedTable, point: readonly DataValue[]): DataValue[];
}

function scale(value: number, min: number, max: number): number {
    const range = max - min;
    return range === 0 ? 0 : (value - min) / range;
}

/**
 * Range transformation to [0, 1] using each numeric feature column's min and max.
 * The label column is left as is.
 */
export class MinMaxNormalizer implements Normalizer {
    normalize(table: TypedTable): void {
        for (const column of table.featureNumerics()) {
            const values = table.numericColumn(column);
            let min = Infinity;
            let max = -Infinity;
            for (const v of values) {
                if (v < min) min = v;
                if (v > max) max = v;
            }
            if (values.length === 0) {
                min = 0;
                max = 0;
            }

            table.setNormalizationBounds(column, min, max);
            table.mapColumn(column, v => (typeof v === 'number' ? scale(v, min, max) : v));
        }
    }

    renormalize(table: TypedTable, point: readonly DataValue[]): DataValue[] {
        const keys = table.attributes();
        return point.map((value, i) => {
            const bounds = table.getNormalizationBounds(keys[i]);
            if (!bounds || typeof value !== 'number') return value;
            return scale(value, bounds.min, bounds.max);
        });
    }
}

export const defaultNormalizer: Normalizer = new MinMaxNormalizer();
