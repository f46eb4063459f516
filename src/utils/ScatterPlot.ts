// ScatterPlot.ts - 2D views of a table, colored by label, rendered as a Plotly page

import fs from 'fs';
import { PCA } from 'ml-pca';
import { Matrix } from 'ml-matrix';
import { type DataValue, formatValue } from '../core/DataValue';
import { IOError, type Result, SchemaError, fail, ok } from '../core/Errors';
import type { TypedTable } from '../core/TypedTable';

export interface ScatterPoint {
    x: number;
    y: number;
    label: string;
    color: string;
}

export const palette = [
    "#1f77b4", "#ff7f0e", "#2ca02c", "#d62728",
    "#9467bd", "#8c564b", "#e377c2", "#7f7f7f",
    "#bcbd22", "#17becf"
];

export const targetColor = "#000000";

function labelsOf(table: TypedTable): string[] {
    const labelAt = table.labelIndex();
    return Array.from(table.rows(), row => (labelAt === -1 ? '' : formatValue(row[labelAt])));
}

function colorPoints(coords: number[][], labels: string[]): ScatterPoint[] {
    const labelToColor = new Map<string, string>();
    for (const label of labels) {
        if (!labelToColor.has(label)) {
            labelToColor.set(label, palette[labelToColor.size % palette.length]);
        }
    }
    return coords.map(([x, y], i) => ({
        x,
        y,
        label: labels[i],
        color: labelToColor.get(labels[i]) ?? palette[0],
    }));
}

export class ScatterPlot {
    constructor(
        public readonly title: string,
        public readonly xLabel: string,
        public readonly yLabel: string,
        public readonly points: ScatterPoint[]
    ) { }

    /**
     * Plot two numeric columns against each other. Colors follow the label
     * in first-seen order; an optional target point is drawn in black.
     */
    static fromColumns(table: TypedTable, x: string, y: string, target?: [number, number]): Result<ScatterPlot> {
        for (const attribute of [x, y]) {
            if (!table.hasAttribute(attribute)) {
                return fail(new SchemaError(`attribute \`${attribute}\` not found`, { attribute }));
            }
            if (!table.isNumericColumn(attribute)) {
                return fail(new SchemaError(`\`${attribute}\` is not a numerical type`, { attribute }));
            }
        }

        const xs = table.numericColumn(x);
        const ys = table.numericColumn(y);
        const points = colorPoints(xs.map((v, i) => [v, ys[i]]), labelsOf(table));
        if (target) {
            points.push({ x: target[0], y: target[1], label: 'target', color: targetColor });
        }
        return ok(new ScatterPlot(`${x} vs ${y}`, x, y, points));
    }

    /**
     * Project the numeric feature columns onto their first two principal components.
     */
    static fromPCA(table: TypedTable, target?: readonly DataValue[]): Result<ScatterPlot> {
        const features = table.featureNumerics();
        if (features.length < 2) {
            return fail(new SchemaError(`PCA needs at least 2 numeric feature columns, found ${features.length}`));
        }

        const at = features.map(f => table.columnIndex(f));
        const vectors = Array.from(table.rows(), row => at.map(i => Number(row[i])));
        const m = new Matrix(vectors);
        const pca = new PCA(m);
        const reduced = pca.predict(m, { nComponents: 2 }).to2DArray();

        const points = colorPoints(reduced, labelsOf(table));
        if (target) {
            const aligned = table.alignPoint(target);
            if (!aligned.success) return aligned;
            const [projected] = pca.predict(new Matrix([at.map(i => Number(aligned.data[i]))]), { nComponents: 2 }).to2DArray();
            points.push({ x: projected[0], y: projected[1], label: 'target', color: targetColor });
        }
        return ok(new ScatterPlot('PCA projection', 'PC1', 'PC2', points));
    }

    toHtml(): string {
        const traces = new Map<string, ScatterPoint[]>();
        for (const p of this.points) {
            const group = traces.get(p.label) ?? [];
            group.push(p);
            traces.set(p.label, group);
        }
        const data = Array.from(traces, ([label, pts]) => ({
            x: pts.map(p => p.x),
            y: pts.map(p => p.y),
            mode: 'markers',
            type: 'scatter',
            name: label,
            marker: { color: pts[0].color, size: label === 'target' ? 14 : 8 },
        }));

        return `<!DOCTYPE html>
<html>
<head>
  <meta charset="UTF-8">
  <title>${this.title}</title>
  <script src="https://cdn.plot.ly/plotly-latest.min.js"></script>
</head>
<body>
  <div id="plot" style="width:100%;height:90vh;"></div>
  <script>
    Plotly.newPlot('plot', ${JSON.stringify(data)}, ${JSON.stringify({
            title: this.title,
            xaxis: { title: this.xLabel },
            yaxis: { title: this.yLabel },
        })});
  </script>
</body>
</html>
`;
    }

    writeHtml(path: string): Result<void> {
        try {
            fs.writeFileSync(path, this.toHtml(), 'utf8');
        } catch (err) {
            const message = err instanceof Error ? err.message : String(err);
            return fail(new IOError(path, `could not write plot (${message})`));
        }
        console.log(`💾 Saved plot to ${path}.`);
        return ok(undefined);
    }
}
