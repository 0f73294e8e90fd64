import { Counter, Gauge, Histogram, Registry, collectDefaultMetrics } from 'prom-client';

export interface CollectorMetrics {
  register: Registry;
  passes: Counter<'outcome'>;
  passDuration: Histogram<string>;
  destinationFailures: Counter<'destination'>;
  repairedLines: Counter<'query'>;
  topologyIssues: Counter<'subject'>;
  lastSuccessfulPass: Gauge<string>;
}

export type PassOutcome = 'success' | 'partial' | 'failure';

export const createMetrics = (options: { collectDefaults?: boolean } = {}): CollectorMetrics => {
  const register = new Registry();
  if (options.collectDefaults) {
    collectDefaultMetrics({ register });
  }

  const passes = new Counter({
    name: 'pbs_pulse_passes_total',
    help: 'Aggregation passes by outcome',
    registers: [register],
    labelNames: ['outcome'] as const
  });

  const passDuration = new Histogram({
    name: 'pbs_pulse_pass_duration_seconds',
    help: 'Duration of an aggregation pass, fetch to publication',
    registers: [register],
    buckets: [0.5, 1, 2, 5, 10, 20, 30, 60]
  });

  const destinationFailures = new Counter({
    name: 'pbs_pulse_destination_failures_total',
    help: 'Failed document writes per destination',
    registers: [register],
    labelNames: ['destination'] as const
  });

  const repairedLines = new Counter({
    name: 'pbs_pulse_repaired_lines_total',
    help: 'Malformed scheduler output lines dropped before parsing',
    registers: [register],
    labelNames: ['query'] as const
  });

  const topologyIssues = new Counter({
    name: 'pbs_pulse_topology_issues_total',
    help: 'Nodes or jobs referencing an undeclared queue',
    registers: [register],
    labelNames: ['subject'] as const
  });

  const lastSuccessfulPass = new Gauge({
    name: 'pbs_pulse_last_successful_pass_timestamp_seconds',
    help: 'Unix time of the last pass whose primary publication succeeded',
    registers: [register]
  });

  return {
    register,
    passes,
    passDuration,
    destinationFailures,
    repairedLines,
    topologyIssues,
    lastSuccessfulPass
  };
};
