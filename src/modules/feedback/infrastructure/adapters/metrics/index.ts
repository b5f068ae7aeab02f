export { PrometheusMetricsAdapter } from './prometheus-metrics.adapter';
