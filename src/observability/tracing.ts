/**
 * OpenTelemetry Tracing (Opt-in)
 *
 * Wraps outgoing API reads in client spans. No-op unless enabled via
 * OTEL_ENABLED=1 (or "true"); exporter and SDK setup belong to the host
 * application, which registers its tracer provider with @opentelemetry/api.
 */

import { trace, SpanStatusCode, SpanKind, Span } from '@opentelemetry/api';

const TRACER_NAME = 'tweet-activitystreams';

/**
 * Check if OpenTelemetry is enabled
 */
export function isOTelEnabled(): boolean {
  return process.env.OTEL_ENABLED === '1' || process.env.OTEL_ENABLED === 'true';
}

/**
 * Get the global tracer instance
 */
export function getTracer() {
  if (!isOTelEnabled()) {
    return null;
  }
  return trace.getTracer(TRACER_NAME);
}

/**
 * Execute a function within a span
 *
 * @param name - Span name
 * @param fn - Function to execute
 * @param attributes - Optional span attributes
 * @returns Result of fn
 */
export async function withSpan<T>(
  name: string,
  fn: (span: Span | null) => Promise<T>,
  attributes?: Record<string, string | number | boolean>
): Promise<T> {
  const tracer = getTracer();

  // If tracing disabled, execute without span
  if (!tracer) {
    return fn(null);
  }

  return tracer.startActiveSpan(name, async (span) => {
    try {
      if (attributes) {
        Object.entries(attributes).forEach(([key, value]) => {
          span.setAttribute(key, value);
        });
      }

      const result = await fn(span);
      span.setStatus({ code: SpanStatusCode.OK });
      return result;
    } catch (error: unknown) {
      const err = error instanceof Error ? error : new Error(String(error));
      span.recordException(err);
      span.setStatus({
        code: SpanStatusCode.ERROR,
        message: err.message,
      });
      throw error;
    } finally {
      span.end();
    }
  });
}

/**
 * Create a span for an API read
 *
 * @param method - HTTP method
 * @param url - Request URL
 * @param endpoint - Endpoint name (e.g. 'statuses/show')
 */
export async function withHttpSpan<T>(
  method: string,
  url: string,
  endpoint: string,
  fn: (span: Span | null) => Promise<T>
): Promise<T> {
  return withSpan(`HTTP ${method}`, fn, {
    'http.method': method,
    'http.url': url,
    'api.endpoint': endpoint,
    'span.kind': SpanKind.CLIENT,
  });
}
