import client from 'prom-client';

// Collect default Node.js metrics (GC, event loop, memory)
client.collectDefaultMetrics();

export const bytesThrottled = new client.Counter({
  name: 'streamcap_bytes_total',
  help: 'Total bytes forwarded through throttled streams',
});

export const acquireWait = new client.Histogram({
  name: 'streamcap_acquire_wait_seconds',
  help: 'Time spent waiting for bucket capacity per acquire',
  buckets: [0.001, 0.01, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5],
});

export const keyedHandlers = new client.Gauge({
  name: 'streamcap_keyed_handlers',
  help: 'Handlers currently cached per classification key',
  labelNames: ['cache'] as const,
});

export const keyedHandlerEvictions = new client.Counter({
  name: 'streamcap_keyed_handler_evictions_total',
  help: 'Cached per-key handlers removed after sitting idle',
  labelNames: ['cache'] as const,
});

export const httpRequests = new client.Counter({
  name: 'streamcap_http_requests_total',
  help: 'Requests served by the throttling file server',
  labelNames: ['mode', 'status'] as const,
});

export const metricsRegistry = client.register;
