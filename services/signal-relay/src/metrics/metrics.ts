import client from 'prom-client';
export const registry = new client.Registry();
client.collectDefaultMetrics({ register: registry });

export const httpReqDuration = new client.Histogram({
  name: 'http_request_duration_ms',
  help: 'HTTP request duration',
  labelNames: ['method', 'route', 'code'],
  buckets: [1, 5, 10, 25, 50, 100, 150, 250, 500, 1000]
});
registry.registerMetric(httpReqDuration);

export const webhookRequests = new client.Counter({
  name: 'webhook_requests_total',
  help: 'inbound webhook calls by outcome',
  labelNames: ['outcome'],
});
export const webhookDuplicates = new client.Counter({ name: 'webhook_duplicates_total', help: 'suppressed duplicate alerts' });
export const webhookDropped    = new client.Counter({ name: 'webhook_dropped_total',    help: 'alerts dropped on a full queue' });
export const budgetExceeded    = new client.Counter({ name: 'webhook_budget_exceeded_total', help: 'requests over the latency budget' });
registry.registerMetric(webhookRequests);
registry.registerMetric(webhookDuplicates);
registry.registerMetric(webhookDropped);
registry.registerMetric(budgetExceeded);

export const deliveryAttempts = new client.Counter({
  name: 'delivery_attempts_total',
  help: 'send attempts to the messaging API',
  labelNames: ['result'],
});
export const deliveryTasks = new client.Counter({
  name: 'delivery_tasks_total',
  help: 'delivery tasks reaching a terminal state',
  labelNames: ['state'],
});
export const queueDepth = new client.Gauge({ name: 'delivery_queue_depth', help: 'tasks waiting in the delivery queue' });
export const limiterWait = new client.Histogram({
  name: 'rate_limiter_wait_ms',
  help: 'time spent waiting for a send token',
  buckets: [0, 10, 50, 100, 250, 500, 1000, 2000]
});
registry.registerMetric(deliveryAttempts);
registry.registerMetric(deliveryTasks);
registry.registerMetric(queueDepth);
registry.registerMetric(limiterWait);
