import type { DataValue } from '../core/DataValue';
import { BoundsError, type KNNError, type Result, SchemaError, fail, ok } from '../core/Errors';
import {
    type ConfusionMatrix,
    type EvaluationReport,
    evaluateMatrix,
    formatReport,
    recordPrediction,
} from '../core/Evaluation';
import { type ComparisonPolicy, type KNNConfig, defaultKNNConfig } from '../core/KNNConfig';
import type { TypedTable } from '../core/TypedTable';
import { loadTable } from '../utils/IO';
import type { DistanceMeasure } from './Distance';

export interface Neighbor {
    distance: number;
    index: number;
}

export interface SearchOptions {
    /** The query is already in the reference table's scaled space. */
    normalized?: boolean;
}

export interface LabelWeight {
    label: DataValue;
    weight: number;
}

export class KNN {
    public readonly k: number;
    public readonly modelName: string;
    public verbose: boolean;

    private readonly dataset: TypedTable;
    private readonly comparison: ComparisonPolicy;
    private measure: DistanceMeasure;

    private constructor(config: KNNConfig & typeof defaultKNNConfig) {
        this.dataset = config.table;
        this.k = config.k;
        this.measure = config.distance;
        this.comparison = config.comparison;
        this.modelName = config.log?.modelName ?? 'KNN';
        this.verbose = config.log?.verbose ?? true;
    }

    /**
     * Build a model over `config.table`. The model takes ownership of the table:
     * it sets the label and normalizes it in place unless it has been normalized
     * already.
     */
    static create(config: KNNConfig): Result<KNN> {
        const cfg = { ...defaultKNNConfig, ...config };
        const verbose = cfg.log?.verbose ?? true;
        const table = cfg.table;

        const labelled = cfg.label ? table.setLabel(cfg.label) : table.getLabel();
        if (!labelled.success) return KNN.report(labelled.error, verbose);

        if (!Number.isInteger(cfg.k) || cfg.k < 1 || cfg.k > table.rowCount) {
            return KNN.report(new BoundsError(`k must be an integer in [1, ${table.rowCount}], got ${cfg.k}`, {
                k: cfg.k,
                rowCount: table.rowCount,
            }), verbose);
        }

        if (!table.hasBeenNormalized()) table.normalize();

        const model = new KNN(cfg);
        if (verbose) {
            console.log(`✅ ${model.modelName} ready: k=${model.k}, ${table.rowCount} reference rows, label \`${labelled.data}\`, ${model.measure.name} distance`);
        }
        return ok(model);
    }

    /**
     * Load a reference table from CSV and build a model over it.
     */
    static fromCSV(path: string, config: Omit<KNNConfig, 'table'> & { label: string }): Result<KNN> {
        const loaded = loadTable(path, { verbose: config.log?.verbose });
        if (!loaded.success) return loaded;
        return KNN.create({ ...config, table: loaded.data });
    }

    getDataset(): TypedTable {
        return this.dataset;
    }

    getDistanceMeasure(): DistanceMeasure {
        return this.measure;
    }

    /** Swap the distance measure, returning the one it replaces. */
    setDistanceMeasure(measure: DistanceMeasure): DistanceMeasure {
        const previous = this.measure;
        this.measure = measure;
        return previous;
    }

    /**
     * The k reference rows closest to `query`, ordered by the comparison policy.
     * The sort is stable, so rows at equal distance keep ascending row order.
     */
    firstKnn(query: readonly DataValue[], options: SearchOptions = {}): Result<Neighbor[]> {
        const labelled = this.dataset.getLabel();
        if (!labelled.success) return this.fail(labelled.error);

        const rowCount = this.dataset.rowCount;
        if (this.k > rowCount) {
            return this.fail(new BoundsError(`k = ${this.k} exceeds the ${rowCount} reference rows`, { k: this.k, rowCount }));
        }

        const target = this.prepareQuery(query, options);
        if (!target.success) return target;

        const scored: Neighbor[] = [];
        let index = 0;
        for (const row of this.dataset.rows()) {
            scored.push({ distance: this.measure.distance(this.dataset, row, target.data), index });
            index++;
        }

        const better = this.comparison;
        scored.sort((a, b) => {
            if (better(a.distance, b.distance)) return -1;
            if (better(b.distance, a.distance)) return 1;
            return 0;
        });

        return ok(scored.slice(0, this.k));
    }

    /**
     * Accumulated exp(-distance) weight per label over the k nearest neighbors,
     * normalized to sum to 1, in the order labels were first reached.
     */
    vote(query: readonly DataValue[], options: SearchOptions = {}): Result<LabelWeight[]> {
        const neighbors = this.firstKnn(query, options);
        if (!neighbors.success) return neighbors;

        const labels = this.labelColumn();
        if (!labels.success) return labels;

        let raw = neighbors.data.map(n => Math.exp(-n.distance));
        let sum = raw.reduce((a, b) => a + b, 0);
        if (sum === 0) {
            raw = raw.map(() => 1);
            sum = raw.length;
        }

        const weights = new Map<DataValue, number>();
        neighbors.data.forEach((n, i) => {
            const label = labels.data[n.index];
            weights.set(label, (weights.get(label) ?? 0) + raw[i] / sum);
        });

        return ok(Array.from(weights, ([label, weight]) => ({ label, weight })));
    }

    /**
     * Distance-weighted vote among the k nearest neighbors. On equal weight the
     * label reached first, walking neighbors from the closest, wins.
     */
    predict(query: readonly DataValue[], options: SearchOptions = {}): Result<DataValue> {
        const votes = this.vote(query, options);
        if (!votes.success) return votes;

        let best: LabelWeight | undefined;
        for (const candidate of votes.data) {
            if (!best || candidate.weight > best.weight) best = candidate;
        }
        if (!best) return this.fail(new SchemaError('no neighbors to vote with'));
        return ok(best.label);
    }

    /**
     * Predict every row of `testData` and count `matrix[actual][predicted]`.
     * Rows of a table that was never normalized are treated as raw and
     * renormalized. Rows of a normalized table are used as they are, which
     * requires it to carry the reference table's parameters (e.g. a split of it).
     */
    evaluate(testData: TypedTable): Result<EvaluationReport> {
        const expected = this.dataset.attributes();
        const received = testData.attributes();
        if (expected.length !== received.length || expected.some((key, i) => key !== received[i])) {
            return this.fail(new SchemaError('test table columns do not match the reference table', { expected, received }));
        }

        const labelAt = this.dataset.labelIndex();
        if (labelAt === -1) return this.fail(new SchemaError('no label set yet'));

        const normalized = testData.hasBeenNormalized();
        if (normalized && !sameParams(testData.normalizationParams(), this.dataset.normalizationParams())) {
            return this.fail(new SchemaError('test table was normalized with other parameters than the reference table'));
        }

        const options: SearchOptions = { normalized };
        const matrix: ConfusionMatrix = new Map();
        for (const row of testData.rows()) {
            const predicted = this.predict(row, options);
            if (!predicted.success) return predicted;
            recordPrediction(matrix, row[labelAt], predicted.data);
        }

        const report = evaluateMatrix(matrix);
        if (this.verbose) console.log('\n' + formatReport(report, this.modelName) + '\n');
        return ok(report);
    }

    private prepareQuery(query: readonly DataValue[], options: SearchOptions): Result<DataValue[]> {
        const aligned = this.dataset.alignPoint(query);
        if (!aligned.success) return aligned;
        if (options.normalized) return aligned;
        return this.dataset.renormalize(aligned.data);
    }

    private labelColumn(): Result<DataValue[]> {
        const label = this.dataset.getLabel();
        if (!label.success) return label;
        return this.dataset.column(label.data);
    }

    private fail<T>(error: KNNError): Result<T> {
        return KNN.report(error, this.verbose);
    }

    private static report<T>(error: KNNError, verbose: boolean): Result<T> {
        if (verbose) console.error(`❌ ${error.message}`);
        return fail(error);
    }
}

function sameParams(a: ReadonlyMap<string, number>, b: ReadonlyMap<string, number>): boolean {
    if (a.size !== b.size) return false;
    for (const [key, value] of a) {
        if (b.get(key) !== value) return false;
    }
    return true;
}
