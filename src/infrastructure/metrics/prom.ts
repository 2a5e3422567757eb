import type { NextFunction, Request, Response } from 'express';
import { Counter, Gauge, Histogram, Registry, collectDefaultMetrics } from 'prom-client';

const registry = new Registry();

const httpRequestDurationSeconds = new Histogram({
  name: 'http_server_request_duration_seconds',
  help: 'HTTP server request duration in seconds',
  labelNames: ['method', 'route', 'status'] as const,
  buckets: [0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2, 5]
});
registry.registerMetric(httpRequestDurationSeconds);

const httpResponsesTotal = new Counter({
  name: 'http_server_responses_total',
  help: 'Total HTTP responses grouped by status class',
  labelNames: ['method', 'route', 'status_class'] as const
});
registry.registerMetric(httpResponsesTotal);

const bookingCommandsTotal = new Counter({
  name: 'booking_commands_total',
  help: 'Booking commands grouped by kind and outcome',
  labelNames: ['kind', 'outcome'] as const
});
registry.registerMetric(bookingCommandsTotal);

const eventsAppendedTotal = new Counter({
  name: 'booking_events_appended_total',
  help: 'Events durably appended to the log',
  labelNames: ['event_type'] as const
});
registry.registerMetric(eventsAppendedTotal);

const appendConflictsTotal = new Counter({
  name: 'booking_append_conflicts_total',
  help: 'Appends rejected by the optimistic concurrency check'
});
registry.registerMetric(appendConflictsTotal);

const staleCommandsTotal = new Counter({
  name: 'booking_stale_commands_total',
  help: 'Change commands rejected before append because their expected version was stale'
});
registry.registerMetric(staleCommandsTotal);

const projectionFailuresTotal = new Counter({
  name: 'booking_projection_failures_total',
  help: 'Stored events that could not be folded into the read model',
  labelNames: ['event_type'] as const
});
registry.registerMetric(projectionFailuresTotal);

const projectorLagSeconds = new Gauge({
  name: 'projector_event_lag_seconds',
  help: 'Lag in seconds between the latest processed event and now',
  labelNames: ['projector'] as const
});
registry.registerMetric(projectorLagSeconds);

function routeLabel(req: Request): string {
  const route: unknown = req.route?.path;
  if (typeof route === 'string') {
    return route;
  }

  if (req.baseUrl && req.path) {
    return `${req.baseUrl}${req.path}`;
  }

  return req.originalUrl?.split('?')[0] ?? 'unknown';
}

function statusClassLabel(statusCode: number): string {
  if (statusCode >= 200 && statusCode < 300) {
    return '2xx';
  }

  if (statusCode >= 300 && statusCode < 400) {
    return '3xx';
  }

  if (statusCode >= 400 && statusCode < 500) {
    return '4xx';
  }

  if (statusCode >= 500 && statusCode < 600) {
    return '5xx';
  }

  return 'other';
}

export function httpMetricsMiddleware(req: Request, res: Response, next: NextFunction): void {
  const start = process.hrtime.bigint();

  res.on('finish', () => {
    const durationNanos = process.hrtime.bigint() - start;
    const durationSeconds = Number(durationNanos) / 1e9;
    const method = req.method.toUpperCase();
    const route = routeLabel(req);
    const statusCode = res.statusCode;
    const status = statusCode.toString();
    const statusClass = statusClassLabel(statusCode);

    httpRequestDurationSeconds.labels({ method, route, status }).observe(durationSeconds);
    httpResponsesTotal.labels({ method, route, status_class: statusClass }).inc();
  });

  next();
}

// Only the server process collects runtime metrics; tests and the CLI don't.
export function enableDefaultMetrics(): void {
  collectDefaultMetrics({ register: registry });
}

export function getRegistry(): Registry {
  return registry;
}

export function recordCommand(kind: string, outcome: string): void {
  bookingCommandsTotal.labels({ kind, outcome }).inc();
}

export function recordAppended(eventType: string): void {
  eventsAppendedTotal.labels({ event_type: eventType }).inc();
}

export function recordAppendConflict(): void {
  appendConflictsTotal.inc();
}

export function recordStaleCommand(): void {
  staleCommandsTotal.inc();
}

export function recordProjectionFailure(eventType: string): void {
  projectionFailuresTotal.labels({ event_type: eventType }).inc();
}

export function setProjectorLag(projector: string, lagSeconds: number): void {
  const safeLag = Number.isFinite(lagSeconds) && lagSeconds >= 0 ? lagSeconds : 0;
  projectorLagSeconds.labels({ projector }).set(safeLag);
}
