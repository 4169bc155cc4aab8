import { Registry, collectDefaultMetrics, Counter, Histogram, Gauge } from 'prom-client';

export const registry = new Registry();

collectDefaultMetrics({ register: registry, prefix: 'icodex_' });

export const httpRequestDuration = new Histogram({
  name: 'icodex_http_request_duration_seconds',
  help: 'HTTP request duration in seconds',
  labelNames: ['method', 'route', 'status'],
  buckets: [0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2, 5],
  registers: [registry],
});

export const httpRequestCounter = new Counter({
  name: 'icodex_http_requests_total',
  help: 'Total HTTP requests',
  labelNames: ['method', 'route', 'status'],
  registers: [registry],
});

export const orderOperationCounter = new Counter({
  name: 'icodex_order_operations_total',
  help: 'Order book operations by outcome (ok or error kind)',
  labelNames: ['operation', 'result'],
  registers: [registry],
});

export const oracleRequestDuration = new Histogram({
  name: 'icodex_oracle_request_duration_seconds',
  help: 'Balance oracle round-trip time',
  labelNames: ['asset', 'outcome'],
  buckets: [0.01, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10],
  registers: [registry],
});

export const restingOrdersGauge = new Gauge({
  name: 'icodex_resting_orders',
  help: 'Live sell orders per ICO after the last persisted mutation',
  labelNames: ['ico_id'],
  registers: [registry],
});
