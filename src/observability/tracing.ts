/**
 * OpenTelemetry tracing (opt-in)
 *
 * Spans are created only when OTEL_ENABLED is set and an SDK has been
 * registered by the host process; otherwise every helper runs its callback
 * directly.
 */

import { trace, context, SpanStatusCode, SpanKind, Span } from '@opentelemetry/api';
import { v4 as uuidv4 } from 'uuid';

const TRACER_NAME = 'ticket-sheet-sync';

export function isOTelEnabled(): boolean {
  return process.env.OTEL_ENABLED === '1' || process.env.OTEL_ENABLED === 'true';
}

export function getTracer() {
  if (!isOTelEnabled()) {
    return null;
  }
  return trace.getTracer(TRACER_NAME);
}

/**
 * Generate a run/correlation id
 */
export function generateCorrelationId(): string {
  return uuidv4();
}

/**
 * Execute a function within a span
 */
export async function withSpan<T>(
  name: string,
  fn: (span: Span | null) => Promise<T>,
  attributes?: Record<string, string | number | boolean>
): Promise<T> {
  const tracer = getTracer();

  if (!tracer) {
    return fn(null);
  }

  return tracer.startActiveSpan(name, async (span) => {
    try {
      if (attributes) {
        for (const [key, value] of Object.entries(attributes)) {
          span.setAttribute(key, value);
        }
      }

      const result = await fn(span);
      span.setStatus({ code: SpanStatusCode.OK });
      return result;
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      if (error instanceof Error) span.recordException(error);
      span.setStatus({ code: SpanStatusCode.ERROR, message });
      throw error;
    } finally {
      span.end();
    }
  });
}

export async function withHttpSpan<T>(
  method: string,
  url: string,
  fn: (span: Span | null) => Promise<T>
): Promise<T> {
  return withSpan(`HTTP ${method}`, fn, {
    'http.method': method,
    'http.url': url,
    'span.kind': SpanKind.CLIENT,
  });
}

/**
 * Span around one synchronization trigger
 */
export async function withRunSpan<T>(
  trigger: string,
  runId: string,
  fn: (span: Span | null) => Promise<T>
): Promise<T> {
  return withSpan(`Sync ${trigger}`, fn, {
    'sync.trigger': trigger,
    'sync.run_id': runId,
  });
}

export async function withSinkSpan<T>(
  operation: string,
  sink: string,
  location: string,
  fn: (span: Span | null) => Promise<T>
): Promise<T> {
  return withSpan(`Sink ${operation}`, fn, {
    'sink.operation': operation,
    'sink.kind': sink,
    'sink.location': location,
  });
}

export async function withCredentialSpan<T>(
  operation: string,
  identity: string,
  fn: (span: Span | null) => Promise<T>
): Promise<T> {
  return withSpan(`Credential ${operation}`, fn, {
    'credential.operation': operation,
    'credential.identity': identity,
  });
}

export function getCurrentSpan(): Span | undefined {
  if (!isOTelEnabled()) {
    return undefined;
  }
  return trace.getSpan(context.active());
}

export function addSpanEvent(name: string, attributes?: Record<string, string | number | boolean>): void {
  getCurrentSpan()?.addEvent(name, attributes);
}
