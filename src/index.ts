export * from './core/DataValue';
export * from './core/Errors';
export * from './core/Evaluation';
export * from './core/KNNConfig';
export * from './core/Normalizer';
export * from './core/TypedTable';
export * from './ml/Distance';
export * from './ml/KNN';
export * from './utils/IO';
export * from './utils/PrettyTable';
export * from './utils/ScatterPlot';
