import { type DataValue, valuesEqual } from './DataValue';

export type ConfusionMatrix = Map<DataValue, Map<DataValue, number>>;

export interface MicroMetrics {
    truePositives: number;
    falsePositives: number;
    falseNegatives: number;
    trueNegatives: number;
    precision: number;
    recall: number;
    accuracy: number;
}

export interface EvaluationReport {
    matrix: ConfusionMatrix;
    total: number;
    metrics: MicroMetrics;
    legacy: MicroMetrics;
}

export function recordPrediction(matrix: ConfusionMatrix, actual: DataValue, predicted: DataValue): void {
    let row = matrix.get(actual);
    if (!row) {
        row = new Map();
        matrix.set(actual, row);
    }
    row.set(predicted, (row.get(predicted) ?? 0) + 1);
}

export function buildConfusionMatrix(actual: DataValue[], predicted: DataValue[]): ConfusionMatrix {
    const matrix: ConfusionMatrix = new Map();
    actual.forEach((label, i) => recordPrediction(matrix, label, predicted[i]));
    return matrix;
}

export function matrixTotal(matrix: ConfusionMatrix): number {
    let total = 0;
    for (const row of matrix.values()) {
        for (const count of row.values()) total += count;
    }
    return total;
}

function ratio(numerator: number, denominator: number): number {
    return denominator === 0 ? 0 : numerator / denominator;
}

/**
 * Pooled counts over all classes. FN and FP each collect the off-diagonal mass
 * once (by actual row and by predicted column); TN sums every class's
 * `total - TP_c - FP_c - FN_c`.
 */
export function microMetrics(matrix: ConfusionMatrix): MicroMetrics {
    const total = matrixTotal(matrix);
    const classes = new Set<DataValue>();
    const rowTotals = new Map<DataValue, number>();
    const columnTotals = new Map<DataValue, number>();
    const diagonal = new Map<DataValue, number>();

    for (const [actual, row] of matrix) {
        classes.add(actual);
        for (const [predicted, count] of row) {
            classes.add(predicted);
            rowTotals.set(actual, (rowTotals.get(actual) ?? 0) + count);
            columnTotals.set(predicted, (columnTotals.get(predicted) ?? 0) + count);
            if (valuesEqual(actual, predicted)) diagonal.set(actual, count);
        }
    }

    let tp = 0, fn = 0, fp = 0, tn = 0;
    for (const c of classes) {
        const tpc = diagonal.get(c) ?? 0;
        const fnc = (rowTotals.get(c) ?? 0) - tpc;
        const fpc = (columnTotals.get(c) ?? 0) - tpc;
        tp += tpc;
        fn += fnc;
        fp += fpc;
        tn += total - tpc - fnc - fpc;
    }

    return {
        truePositives: tp,
        falsePositives: fp,
        falseNegatives: fn,
        trueNegatives: tn,
        precision: ratio(tp, tp + fp),
        recall: ratio(tp, tp + fn),
        accuracy: ratio(tp, total),
    };
}

/**
 * The figures older reports were produced with: every off-diagonal cell counts
 * as both FN and FP, and TN is the full matrix mass plus the diagonal again.
 * Accuracy is then (TP + TN) / (TP + TN + FP + FN).
 */
export function legacyMicroMetrics(matrix: ConfusionMatrix): MicroMetrics {
    let tp = 0, off = 0, tn = 0;
    for (const [actual, row] of matrix) {
        for (const [predicted, count] of row) {
            if (valuesEqual(actual, predicted)) {
                tp += count;
                tn += count;
            } else {
                off += count;
            }
            tn += count;
        }
    }

    return {
        truePositives: tp,
        falsePositives: off,
        falseNegatives: off,
        trueNegatives: tn,
        precision: ratio(tp, tp + off),
        recall: ratio(tp, tp + off),
        accuracy: ratio(tp + tn, tp + tn + off + off),
    };
}

export function evaluateMatrix(matrix: ConfusionMatrix): EvaluationReport {
    return {
        matrix,
        total: matrixTotal(matrix),
        metrics: microMetrics(matrix),
        legacy: legacyMicroMetrics(matrix),
    };
}

export function toPercent(value: number): number {
    return Math.round(value * 100);
}

export function formatReport(report: EvaluationReport, modelName = 'Model'): string {
    const { metrics } = report;
    return [
        `📋 ${modelName} — Evaluation Summary (${report.total} rows):`,
        `  Micro-Precision : ${toPercent(metrics.precision)}%`,
        `  Micro-Recall    : ${toPercent(metrics.recall)}%`,
        `  Micro-Accuracy  : ${toPercent(metrics.accuracy)}%`,
    ].join('\n');
}
