import {
  makeCounterProvider,
  makeHistogramProvider,
} from '@willsoto/nestjs-prometheus';

export const BUDGET_ANALYSES_TOTAL = 'budget_analyses_total';
export const BUDGET_ANALYSIS_DURATION = 'budget_analysis_duration_seconds';
export const UPSTREAM_FAILURES_TOTAL = 'upstream_failures_total';

export const metricsProviders = [
  makeCounterProvider({
    name: BUDGET_ANALYSES_TOTAL,
    help: 'Total number of budget window analyses by outcome',
    labelNames: ['strategy', 'outcome'],
  }),
  makeHistogramProvider({
    name: BUDGET_ANALYSIS_DURATION,
    help: 'Duration of budget window analyses in seconds',
    labelNames: ['strategy'],
    buckets: [0.5, 1, 2, 5, 10, 20, 40, 60],
  }),
  makeCounterProvider({
    name: UPSTREAM_FAILURES_TOTAL,
    help: 'Recoverable upstream failures by dependency',
    labelNames: ['dependency'],
  }),
];
