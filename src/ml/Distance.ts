import { type DataValue, valuesEqual } from '../core/DataValue';
import { type Result, ok } from '../core/Errors';
import type { TypedTable } from '../core/TypedTable';

/**
 * Dissimilarity between two points laid out like `table`'s columns.
 * Must be non-negative. Symmetry is up to the implementation.
 */
export interface DistanceMeasure {
    readonly name: string;
    distance(table: TypedTable, a: readonly DataValue[], b: readonly DataValue[]): number;
}

/**
 * Euclidean over numeric columns plus an overlap penalty of 1 for every
 * categorical column where the values differ. The label column is skipped.
 */
export class MixedDistance implements DistanceMeasure {
    readonly name = 'mixed';

    distance(table: TypedTable, a: readonly DataValue[], b: readonly DataValue[]): number {
        const labelAt = table.labelIndex();
        let sum = 0;

        for (let i = 0; i < a.length; i++) {
            if (i === labelAt) continue;
            const x = a[i];
            const y = b[i];
            if (typeof x === 'number' && typeof y === 'number') {
                const diff = x - y;
                sum += diff * diff;
            } else {
                sum += valuesEqual(x, y) ? 0 : 1;
            }
        }

        return Math.sqrt(sum);
    }
}

/**
 * Jaccard distance between the character multisets of one text column,
 * e.g. for classifying names by their letters.
 */
export class JaccardDistance implements DistanceMeasure {
    readonly name = 'jaccard';

    constructor(private readonly column: string) { }

    distance(table: TypedTable, a: readonly DataValue[], b: readonly DataValue[]): number {
        const at = table.columnIndex(this.column);
        const left = charCounts(String(a[at] ?? ''));
        const right = charCounts(String(b[at] ?? ''));

        let intersection = 0;
        let union = 0;
        for (const ch of new Set([...left.keys(), ...right.keys()])) {
            const l = left.get(ch) ?? 0;
            const r = right.get(ch) ?? 0;
            intersection += Math.min(l, r);
            union += Math.max(l, r);
        }

        return union === 0 ? 0 : 1 - intersection / union;
    }
}

function charCounts(text: string): Map<string, number> {
    const counts = new Map<string, number>();
    for (const ch of text) {
        counts.set(ch, (counts.get(ch) ?? 0) + 1);
    }
    return counts;
}

export const defaultDistance: DistanceMeasure = new MixedDistance();

/**
 * Distance between two points of either shape (with or without the label
 * column), aligned to the table before the measure sees them.
 */
export function measureDistance(
    table: TypedTable,
    measure: DistanceMeasure,
    a: readonly DataValue[],
    b: readonly DataValue[]
): Result<number> {
    const left = table.alignPoint(a);
    if (!left.success) return left;
    const right = table.alignPoint(b);
    if (!right.success) return right;
    return ok(measure.distance(table, left.data, right.data));
}
