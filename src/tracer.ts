/**
 * OpenTelemetry tracer configuration for autodiag.
 *
 * Data source fetches and the LLM request run inside spans collected by an
 * in-memory exporter, so a run can report where its time went.
 */

import { SpanStatusCode, context, trace, type Attributes, type Tracer } from '@opentelemetry/api';
import {
  BasicTracerProvider,
  InMemorySpanExporter,
  SimpleSpanProcessor,
  type ReadableSpan,
} from '@opentelemetry/sdk-trace-base';
import { AsyncHooksContextManager } from '@opentelemetry/context-async-hooks';
import { errorMessage } from './errors.js';
import { VERSION } from './version.js';

const TRACER_NAME = 'autodiag';

// Singletons survive resetTracer() so context propagation keeps working.
let provider: BasicTracerProvider | null = null;
let exporter: InMemorySpanExporter | null = null;
let contextManager: AsyncHooksContextManager | null = null;
let initialized = false;

/**
 * Initialize the tracer with an in-memory exporter.
 *
 * Subsequent calls are no-ops.
 */
export function initTracer(): void {
  if (initialized) {
    return;
  }

  if (!contextManager) {
    contextManager = new AsyncHooksContextManager();
    contextManager.enable();
    context.setGlobalContextManager(contextManager);
  }

  if (!provider) {
    exporter = new InMemorySpanExporter();
    provider = new BasicTracerProvider({
      spanProcessors: [new SimpleSpanProcessor(exporter)],
    });
    trace.setGlobalTracerProvider(provider);
  }

  initialized = true;
}

/**
 * Get the autodiag tracer. Before initTracer() this is a no-op tracer.
 */
export function getTracer(): Tracer {
  return trace.getTracer(TRACER_NAME, VERSION);
}

/**
 * Run `fn` inside an active span, recording failures on it.
 */
export async function traced<T>(
  name: string,
  attributes: Attributes,
  fn: (setAttributes: (extra: Attributes) => void) => Promise<T>
): Promise<T> {
  return getTracer().startActiveSpan(name, { attributes }, async (span) => {
    try {
      return await fn((extra) => span.setAttributes(extra));
    } catch (e) {
      if (e instanceof Error) {
        span.recordException(e);
      }
      span.setStatus({ code: SpanStatusCode.ERROR, message: errorMessage(e) });
      throw e;
    } finally {
      span.end();
    }
  });
}

/**
 * All finished spans, oldest first.
 */
export function getFinishedSpans(): ReadableSpan[] {
  if (exporter === null) {
    return [];
  }
  return [...exporter.getFinishedSpans()];
}

/**
 * Duration of a finished span in milliseconds.
 */
export function spanDurationMs(span: ReadableSpan): number {
  const [seconds, nanos] = span.duration;
  return Math.round((seconds * 1000 + nanos / 1e6) * 1000) / 1000;
}

/**
 * One line per finished span: name, label and duration.
 */
export function summarizeSpans(spans: readonly ReadableSpan[] = getFinishedSpans()): string[] {
  return spans.map((span) => {
    const label = span.attributes['datasource.name'];
    const suffix = typeof label === 'string' ? ` (${label})` : '';
    const failed = span.status.code === SpanStatusCode.ERROR ? ' [error]' : '';
    return `${span.name}${suffix}: ${spanDurationMs(span)}ms${failed}`;
  });
}

/**
 * Clear collected spans and the initialization flag, keeping the provider
 * registered.
 */
export function resetTracer(): void {
  if (exporter !== null) {
    exporter.reset();
  }
  initialized = false;
}

export function isInitialized(): boolean {
  return initialized;
}

export type { ReadableSpan } from '@opentelemetry/sdk-trace-base';
