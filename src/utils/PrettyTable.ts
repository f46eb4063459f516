import { formatValue } from '../core/DataValue';
import type { TypedTable } from '../core/TypedTable';

export class PrettyTable {
    private data: string[][] = [];

    constructor(private readonly headers: string[]) { }

    addRow(row: string[]): this {
        this.data.push(row);
        return this;
    }

    render(): string {
        if (this.headers.length === 0 || this.data.length === 0) {
            return 'Table is empty.';
        }

        const widths = this.headers.map((header, i) =>
            Math.max(header.length, ...this.data.map(row => row[i]?.length ?? 0))
        );

        const lines: string[] = [];
        lines.push(this.headers.map((h, i) => h.padEnd(widths[i])).join(' | '));
        lines.push(widths.map((w, i) => '-'.repeat(w) + ' ' + (i < widths.length - 1 ? '+ ' : '')).join(''));
        for (const row of this.data) {
            lines.push(row.map((cell, i) => cell.padEnd(widths[i] ?? 0)).join(' | '));
        }
        return lines.join('\n');
    }

    display(): void {
        console.log(this.render());
    }
}

export function printTable(table: TypedTable): void {
    const pretty = new PrettyTable(table.attributes());
    for (const row of table.rows()) {
        pretty.addRow(row.map(formatValue));
    }
    pretty.display();
    console.log(`\n\nTotal printed records: ${table.rowCount}`);
}
