/**
 * Prometheus metrics: provider calls made through the gateway, and their retries.
 */

import { Registry, Counter, Histogram } from "prom-client";

export const registry = new Registry();

export const gatewayRequestCounter = new Counter({
  name: "gateway_requests_total",
  help: "Total provider calls made through the gateway",
  labelNames: ["operation", "status"] as const,
  registers: [registry],
});

export const gatewayRequestDuration = new Histogram({
  name: "gateway_request_duration_seconds",
  help: "Provider call duration in seconds",
  labelNames: ["operation"] as const,
  buckets: [0.1, 0.5, 1, 5, 15, 60, 300, 600],
  registers: [registry],
});

export const gatewayRetryCounter = new Counter({
  name: "gateway_request_retries_total",
  help: "Attempts that failed transiently and were retried",
  labelNames: ["operation"] as const,
  registers: [registry],
});
