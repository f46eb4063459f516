import { describe, it, expect, vi, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { KNN } from '../src/ml/KNN';
import { JaccardDistance, MixedDistance, type DistanceMeasure } from '../src/ml/Distance';
import { TypedTable } from '../src/core/TypedTable';
import { BoundsError, IOError, SchemaError } from '../src/core/Errors';
import { OffsetNormalizer, pointRows, pointTable, unwrap } from './helpers';

const quiet = { verbose: false };

function model(k = 1, table = pointTable()): KNN {
    return unwrap(KNN.create({ table, k, log: quiet }));
}

afterEach(() => {
    vi.restoreAllMocks();
});

describe('KNN.create', () => {
    it('defaults to k = 1 and the mixed distance', () => {
        const knn = unwrap(KNN.create({ table: pointTable(), log: quiet }));
        expect(knn.k).toBe(1);
        expect(knn.getDistanceMeasure()).toBeInstanceOf(MixedDistance);
    });

    it('normalizes the reference table it is given', () => {
        const table = pointTable();
        model(1, table);
        expect(table.hasBeenNormalized()).toBe(true);
        expect(unwrap(table.column('x'))).toEqual([0, 0.1, 1]);
    });

    it('does not normalize a table twice', () => {
        const table = pointTable();
        table.normalize();
        model(1, table);
        expect(unwrap(table.column('x'))).toEqual([0, 0.1, 1]);
    });

    it('sets the label from the config', () => {
        const table = unwrap(TypedTable.fromRows(['x', 'label'], [[0, 'A'], [1, 'B']], quiet));
        const knn = unwrap(KNN.create({ table, label: 'label', log: quiet }));
        expect(unwrap(knn.getDataset().getLabel())).toBe('label');
    });

    it('fails without a label', () => {
        const table = unwrap(TypedTable.fromRows(['x', 'label'], [[0, 'A']], quiet));
        const result = KNN.create({ table, log: quiet });
        expect(result.success).toBe(false);
        if (!result.success) expect(result.error).toBeInstanceOf(SchemaError);
    });

    it('rejects k outside [1, rowCount]', () => {
        for (const k of [0, 4, 1.5]) {
            const result = KNN.create({ table: pointTable(), k, log: quiet });
            expect(result.success).toBe(false);
            if (!result.success) expect(result.error).toBeInstanceOf(BoundsError);
        }
    });

    it('logs failures when verbose', () => {
        const error = vi.spyOn(console, 'error').mockImplementation(() => { });
        KNN.create({ table: pointTable(), k: 9, log: { verbose: true } });
        expect(error).toHaveBeenCalledWith('❌ k must be an integer in [1, 3], got 9');
    });
});

describe('KNN.firstKnn', () => {
    it('returns k neighbors in ascending distance', () => {
        const neighbors = unwrap(model(3).firstKnn([0.1, 0.1]));
        expect(neighbors.map(n => n.index)).toEqual([0, 1, 2]);
        expect(neighbors[0].distance).toBeCloseTo(Math.sqrt(2 * 0.01 ** 2));
        expect(neighbors[1].distance).toBeCloseTo(Math.sqrt(2 * 0.09 ** 2));
        expect(neighbors[2].distance).toBeCloseTo(Math.sqrt(2 * 0.99 ** 2));
        for (let i = 1; i < neighbors.length; i++) {
            expect(neighbors[i].distance).toBeGreaterThanOrEqual(neighbors[i - 1].distance);
        }
    });

    it('returns exactly k pairs', () => {
        expect(unwrap(model(2).firstKnn([5, 5])).length).toBe(2);
    });

    it('keeps row order among equal distances', () => {
        const table = unwrap(TypedTable.fromRows(
            ['v', 'label'],
            [[1, 'A'], [1, 'B'], [0, 'C'], [1, 'D']],
            { label: 'label', verbose: false }
        ));
        const neighbors = unwrap(model(3, table).firstKnn([1]));
        expect(neighbors).toEqual([
            { distance: 0, index: 0 },
            { distance: 0, index: 1 },
            { distance: 0, index: 3 },
        ]);
    });

    it('follows a caller-supplied comparison policy', () => {
        const knn = unwrap(KNN.create({ table: pointTable(), k: 1, comparison: (a, b) => a > b, log: quiet }));
        expect(unwrap(knn.firstKnn([0, 0])).map(n => n.index)).toEqual([2]);
    });

    it('skips renormalization for a query already in scaled space', () => {
        const neighbors = unwrap(model(1).firstKnn([0.1, 0.1], { normalized: true }));
        expect(neighbors).toEqual([{ distance: 0, index: 1 }]);
    });

    it('accepts a query that carries the label column', () => {
        const without = unwrap(model(3).firstKnn([9, 9]));
        const withLabel = unwrap(model(3).firstKnn([9, 9, 'A']));
        expect(withLabel).toEqual(without);
    });

    it('reports k larger than a reference table that shrank after construction', () => {
        const knn = model(3);
        unwrap(knn.getDataset().remove(0));

        const result = knn.firstKnn([5, 5]);
        expect(result.success).toBe(false);
        if (!result.success) {
            expect(result.error).toBeInstanceOf(BoundsError);
            expect(result.error.context).toEqual({ k: 3, rowCount: 2 });
        }
        expect(knn.predict([5, 5]).success).toBe(false);
    });

    it('reports a query that does not fit the table', () => {
        const result = model(1).firstKnn([1]);
        expect(result.success).toBe(false);
        if (!result.success) expect(result.error.kind).toBe('schema');
    });
});

describe('KNN.predict', () => {
    it('labels points near each cluster', () => {
        const knn = model(1);
        expect(unwrap(knn.predict([0.1, 0.1]))).toBe('A');
        expect(unwrap(knn.predict([9, 9]))).toBe('B');
    });

    it('returns the label of an identical training row when k = 1', () => {
        const knn = model(1);
        expect(unwrap(knn.predict([10, 10, 'B']))).toBe('B');
        expect(unwrap(knn.predict([1, 1, 'A']))).toBe('A');
    });

    it('weights closer neighbors more heavily', () => {
        // two A rows against one much closer B row
        const knn = model(3);
        expect(unwrap(knn.predict([9, 9]))).toBe('B');

        const votes = unwrap(knn.vote([9, 9]));
        expect(votes.map(v => v.label)).toEqual(['B', 'A']);
        expect(votes.reduce((sum, v) => sum + v.weight, 0)).toBeCloseTo(1);

        const wB = Math.exp(-Math.sqrt(2 * 0.01));
        const wA = Math.exp(-Math.sqrt(2 * 0.64)) + Math.exp(-Math.sqrt(2 * 0.81));
        expect(votes[0].weight).toBeCloseTo(wB / (wA + wB));
    });

    it('gives all weight to a label shared by every neighbor', () => {
        const table = pointTable([[0, 0, 'A'], [1, 1, 'A'], [2, 2, 'A']]);
        const votes = unwrap(model(3, table).vote([1, 1]));
        expect(votes.map(v => v.label)).toEqual(['A']);
        expect(votes[0].weight).toBeCloseTo(1);
    });

    it('breaks a weight tie in favor of the closest-ranked label', () => {
        const table = unwrap(TypedTable.fromRows(['v', 'label'], [[0, 'A'], [2, 'B']], { label: 'label', verbose: false }));
        expect(unwrap(model(2, table).predict([1]))).toBe('A');
    });

    it('falls back to equal weights when every weight underflows', () => {
        const far: DistanceMeasure = { name: 'far', distance: () => 1e6 };
        const knn = model(3);
        knn.setDistanceMeasure(far);
        const votes = unwrap(knn.vote([0, 0]));
        expect(votes[0].label).toBe('A');
        expect(votes[0].weight).toBeCloseTo(2 / 3);
        expect(unwrap(knn.predict([0, 0]))).toBe('A');
    });
});

describe('KNN with a custom normalizer', () => {
    it('scales the reference table and every query through it', () => {
        const normalizer = new OffsetNormalizer(100);
        const table = unwrap(TypedTable.fromRows(['x', 'y', 'label'], pointRows, { label: 'label', normalizer, verbose: false }));
        const knn = model(1, table);

        expect(normalizer.normalizeCalls).toBe(1);
        expect(table.numericColumn('y')).toEqual([-100, -99, -90]);
        expect(unwrap(knn.firstKnn([10, 10]))).toEqual([{ distance: 0, index: 2 }]);
        expect(unwrap(knn.predict([1, 1]))).toBe('A');
        expect(normalizer.renormalizeCalls).toBe(2);
    });
});

describe('KNN.setDistanceMeasure', () => {
    it('swaps the measure and returns the previous one', () => {
        const knn = model(2);
        const constant: DistanceMeasure = { name: 'constant', distance: () => 0 };
        const previous = knn.setDistanceMeasure(constant);
        expect(previous).toBeInstanceOf(MixedDistance);
        expect(knn.getDistanceMeasure()).toBe(constant);
        expect(unwrap(knn.firstKnn([10, 10])).map(n => n.index)).toEqual([0, 1]);
    });

    it('classifies names with a character overlap measure', () => {
        const table = unwrap(TypedTable.fromRows(
            ['name', 'group'],
            [['xyz', 'x'], ['zyx', 'x'], ['xxy', 'x'], ['abc', 'a'], ['cab', 'a'], ['bba', 'a']],
            { label: 'group', verbose: false }
        ));
        const knn = unwrap(KNN.create({ table, k: 3, distance: new JaccardDistance('name'), log: quiet }));
        expect(unwrap(knn.predict(['yzzx']))).toBe('x');
        expect(unwrap(knn.predict(['acab']))).toBe('a');
    });
});

describe('KNN.evaluate', () => {
    it('yields a diagonal matrix and 100% micro metrics on perfect predictions', () => {
        const knn = model(1);
        const report = unwrap(knn.evaluate(pointTable()));

        expect(report.matrix).toEqual(new Map([
            ['A', new Map([['A', 2]])],
            ['B', new Map([['B', 1]])],
        ]));
        expect(report.metrics.falsePositives).toBe(0);
        expect(report.metrics.falseNegatives).toBe(0);
        expect(report.metrics.precision).toBe(1);
        expect(report.metrics.recall).toBe(1);
    });

    it('counts misclassifications by actual and predicted label', () => {
        const train = unwrap(TypedTable.fromRows(['v', 'label'], [[0, 'A'], [10, 'B']], { label: 'label', verbose: false }));
        const test = unwrap(TypedTable.fromRows(['v', 'label'], [[1, 'A'], [9, 'B'], [2, 'B']], { verbose: false }));
        const report = unwrap(model(1, train).evaluate(test));

        expect(report.matrix.get('B')).toEqual(new Map([['B', 1], ['A', 1]]));
        expect(report.metrics.truePositives).toBe(2);
        expect(report.metrics.precision).toBeCloseTo(2 / 3);
        expect(report.legacy.accuracy).toBeCloseTo(7 / 9);
    });

    it('uses rows of a normalized test table as they are', () => {
        const table = pointTable([[0, 0, 'A'], [1, 1, 'A'], [9, 9, 'B'], [10, 10, 'B']]);
        table.normalize();
        const { train, test } = unwrap(table.split(0.5, () => 0));
        const knn = model(1, train);
        expect(train.getNormalizationBounds('x')).toEqual({ min: 0, max: 10 });

        const report = unwrap(knn.evaluate(test));
        expect(report.total).toBe(2);
        expect(report.metrics.recall).toBe(1);
    });

    it('rejects a test table normalized with its own parameters', () => {
        const knn = model(1);
        const test = pointTable([[0, 0, 'A'], [5, 5, 'B']]);
        test.normalize();

        const result = knn.evaluate(test);
        expect(result.success).toBe(false);
        if (!result.success) expect(result.error).toBeInstanceOf(SchemaError);
    });

    it('prints the report when verbose', () => {
        const log = vi.spyOn(console, 'log').mockImplementation(() => { });
        const knn = unwrap(KNN.create({ table: pointTable(), log: { modelName: 'Points', verbose: true } }));
        knn.evaluate(pointTable());
        expect(log).toHaveBeenLastCalledWith(expect.stringContaining('Micro-Precision : 100%'));
        expect(log).toHaveBeenLastCalledWith(expect.stringContaining('📋 Points — Evaluation Summary (3 rows):'));
    });

    it('rejects a test table with other columns', () => {
        const other = unwrap(TypedTable.fromRows(['x', 'label'], [[0, 'A']], quiet));
        const result = model(1).evaluate(other);
        expect(result.success).toBe(false);
        if (!result.success) expect(result.error).toBeInstanceOf(SchemaError);
    });
});

describe('KNN.fromCSV', () => {
    it('loads, labels and normalizes the reference table', () => {
        const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'knn-'));
        const file = path.join(dir, 'points.csv');
        fs.writeFileSync(file, 'x,y,label\n0,0,A\n1,1,A\n10,10,B\n');

        const knn = unwrap(KNN.fromCSV(file, { label: 'label', log: quiet }));
        expect(knn.getDataset().rowCount).toBe(3);
        expect(unwrap(knn.predict([9, 9]))).toBe('B');
        fs.rmSync(dir, { recursive: true, force: true });
    });

    it('reports a missing file', () => {
        const result = KNN.fromCSV('/nonexistent/points.csv', { label: 'label', log: quiet });
        expect(result.success).toBe(false);
        if (!result.success) expect(result.error).toBeInstanceOf(IOError);
    });
});
