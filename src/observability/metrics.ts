import client from 'prom-client';

export const registry = new client.Registry();
client.collectDefaultMetrics({ register: registry, prefix: 'store_assistant_' });

export const turnsTotal = new client.Counter({
  name: 'store_assistant_turns_total',
  help: 'Conversation turns processed, by resulting mode and outcome',
  labelNames: ['mode', 'outcome'] as const,
  registers: [registry],
});

export const modeTransitions = new client.Counter({
  name: 'store_assistant_mode_transitions_total',
  help: 'Session mode transitions',
  labelNames: ['from', 'to'] as const,
  registers: [registry],
});

export const intentsClassified = new client.Counter({
  name: 'store_assistant_intents_total',
  help: 'Classifier results by label',
  labelNames: ['label'] as const,
  registers: [registry],
});

export const adapterFailures = new client.Counter({
  name: 'store_assistant_adapter_failures_total',
  help: 'Failed adapter calls',
  labelNames: ['adapter'] as const,
  registers: [registry],
});

export const handoffs = new client.Counter({
  name: 'store_assistant_handoffs_total',
  help: 'Sessions handed off to a human operator',
  registers: [registry],
});

export const turnDuration = new client.Histogram({
  name: 'store_assistant_turn_duration_seconds',
  help: 'Wall-clock time of a conversation turn, including persistence',
  buckets: [0.01, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10],
  registers: [registry],
});

export const httpRequestDuration = new client.Histogram({
  name: 'store_assistant_http_request_duration_seconds',
  help: 'HTTP request duration',
  labelNames: ['method', 'route', 'status_code'] as const,
  buckets: [0.01, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5],
  registers: [registry],
});

export function getMetrics(): Promise<string> {
  return registry.metrics();
}

export function getContentType(): string {
  return registry.contentType;
}
