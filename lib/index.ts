export * from '@/types/ecmo';
export * from './aggregation';
export * from './calculations/derived-metrics';
export * from './calculations/registry';
export type { DerivedMetricDefinition, FormulaId } from './calculations/types';
export * from './chart-series';
export * from './correlation';
export * from './csv-parser';
export * from './ecmo-config';
export * from './ecmo-session';
export * from './errors';
export { Logger, logger, type LogEntry, type LogLevel, type LogThreshold } from './logger';
export * from './metrics/daily-summary';
export type { DailyMetric, MetricUnit } from './metrics/contracts';
export * from './record-store';
export * from './schema/columns';
export * from './schema/normalize';
export * from './schema/validation';
export * from './timestamps';
