// DataValue.ts - Cell values of a typed table

/**
 * A table cell: a number in numeric columns, a text token in categorical ones.
 */
export type DataValue = number | string;

const numericPattern = /^[-+]?(\d+\.?\d*|\.\d+)$/;

export function isNumericToken(token: string): boolean {
    return numericPattern.test(token);
}

/**
 * Same-kind equality. A number never equals a string, and NaN equals nothing.
 */
export function valuesEqual(a: DataValue, b: DataValue): boolean {
    if (typeof a !== typeof b) return false;
    return a === b;
}

export function parseValue(token: string, numeric: boolean): DataValue {
    return numeric ? parseFloat(token) : token;
}

export function formatValue(value: DataValue): string {
    return typeof value === 'number' ? String(value) : value;
}
