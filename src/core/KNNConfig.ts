// KNNConfig.ts - Configuration interface and defaults for KNN models

import { type DistanceMeasure, defaultDistance } from '../ml/Distance';
import type { TypedTable } from './TypedTable';

/**
 * Ordering of neighbor distances: true when `a` ranks ahead of `b`.
 */
export type ComparisonPolicy = (a: number, b: number) => boolean;

export const closerIsBetter: ComparisonPolicy = (a, b) => a < b;

export interface KNNConfig {
    /** Reference table; it is normalized when the model is built. */
    table: TypedTable;
    label?: string;
    k?: number;
    distance?: DistanceMeasure;
    comparison?: ComparisonPolicy;

    // Logging
    log?: {
        modelName?: string;
        verbose?: boolean;
    };
}

export const defaultKNNConfig: Required<Pick<KNNConfig, 'k' | 'distance' | 'comparison'>> = {
    k: 1,
    distance: defaultDistance,
    comparison: closerIsBetter,
};
