import type { Counter, Histogram } from 'prom-client';
import client from 'prom-client';

function getOrCreateCounter<L extends string>(name: string, help: string, labelNames: readonly L[]): Counter<L> {
  const existing = client.register.getSingleMetric(name);
  if (existing instanceof client.Counter) return existing;
  return new client.Counter<L>({ name, help, labelNames });
}

function getOrCreateHistogram<L extends string>(
  name: string,
  help: string,
  labelNames: readonly L[],
  buckets: number[]
): Histogram<L> {
  const existing = client.register.getSingleMetric(name);
  if (existing instanceof client.Histogram) return existing;
  return new client.Histogram<L>({ name, help, labelNames, buckets });
}

const messagesSent = getOrCreateCounter('agents_messages_sent_total', 'Messages handed to the mailbox transport', [
  'from',
  'type',
] as const);

const messagesReceived = getOrCreateCounter('agents_messages_received_total', 'Envelopes received per mailbox', [
  'mailbox',
] as const);

const messagesRejected = getOrCreateCounter(
  'agents_messages_rejected_total',
  'Envelopes dropped because they were malformed or of an unexpected type',
  ['mailbox', 'reason'] as const
);

const sendFailures = getOrCreateCounter('agents_send_failures_total', 'Sends that raised a transport error', [
  'from',
  'to',
] as const);

const alertsCreated = getOrCreateCounter('agents_alerts_created_total', 'Alert records appended', [
  'agent_type',
  'severity',
] as const);

const recommendationsCreated = getOrCreateCounter(
  'agents_recommendations_created_total',
  'Recommendation records appended',
  ['generated_by', 'trigger'] as const
);

const decisionsLogged = getOrCreateCounter('agents_decisions_logged_total', 'Router decision log writes', [
  'kind',
  'outcome',
] as const);

const scanDuration = getOrCreateHistogram(
  'agents_scan_duration_ms',
  'Duration of periodic scans in milliseconds',
  ['task'] as const,
  [10, 50, 100, 250, 500, 1000, 5000, 15000, 60000]
);

const ticksSkipped = getOrCreateCounter(
  'agents_ticks_skipped_total',
  'Periodic ticks skipped because the previous run was still in flight',
  ['task'] as const
);

const workerFailures = getOrCreateCounter(
  'agents_worker_failures_total',
  'Failures contained at a worker boundary',
  ['worker', 'stage'] as const
);

export const agentMetrics = {
  recordSent: (from: string, type: string) => messagesSent.inc({ from, type }),
  recordReceived: (mailbox: string) => messagesReceived.inc({ mailbox }),
  recordRejected: (mailbox: string, reason: 'malformed' | 'invalid' | 'unexpected_type') =>
    messagesRejected.inc({ mailbox, reason }),
  recordSendFailure: (from: string, to: string) => sendFailures.inc({ from, to }),
  recordAlert: (agentType: string, severity: string) => alertsCreated.inc({ agent_type: agentType, severity }),
  recordRecommendation: (generatedBy: string, trigger: 'command' | 'sweep') =>
    recommendationsCreated.inc({ generated_by: generatedBy, trigger }),
  recordDecision: (kind: 'inbound' | 'decision', outcome: 'ok' | 'failed') => decisionsLogged.inc({ kind, outcome }),
  startScanTimer: (task: string) => scanDuration.startTimer({ task }),
  recordSkippedTick: (task: string) => ticksSkipped.inc({ task }),
  recordWorkerFailure: (worker: string, stage: string) => workerFailures.inc({ worker, stage }),
};

export const metricsRegistry = client.register;
