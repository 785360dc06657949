export { MetricsLogger, MetricsScope, DEFAULT_FIELDS } from './MetricsLogger';
export type { MetricField, MetricRecord, LogOptions, TimerOptions, MetricsLoggerOptions } from './MetricsLogger';
export { parseMetricsCsv, readMetricRecords, parseExtra } from './MetricsReader';
export type { MetricRow } from './MetricsReader';
export { encodeExtra } from './csv';
export type { MetricExtra } from './csv';
