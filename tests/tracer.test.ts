import { describe, it, expect, afterEach } from 'vitest';
import { SpanStatusCode } from '@opentelemetry/api';
import {
  getFinishedSpans,
  initTracer,
  isInitialized,
  resetTracer,
  spanDurationMs,
  summarizeSpans,
  traced,
} from '../src/tracer.js';

describe('Tracer', () => {
  afterEach(() => {
    resetTracer();
  });

  it('should collect nothing before initialization', async () => {
    expect(isInitialized()).toBe(false);

    const value = await traced('datasource.fetch', {}, async () => 42);

    expect(value).toBe(42);
    expect(getFinishedSpans()).toEqual([]);
  });

  describe('traced()', () => {
    it('should record the span with its attributes', async () => {
      initTracer();

      await traced('datasource.fetch', { 'datasource.name': 'RDS instance' }, async (setAttributes) => {
        setAttributes({ 'datasource.entries': 1 });
      });

      const [span] = getFinishedSpans();
      expect(isInitialized()).toBe(true);
      expect(span.name).toBe('datasource.fetch');
      expect(span.attributes).toEqual({ 'datasource.name': 'RDS instance', 'datasource.entries': 1 });
      expect(span.status.code).toBe(SpanStatusCode.UNSET);
    });

    it('should rethrow and mark the span as failed', async () => {
      initTracer();

      await expect(
        traced('llm.chat.completion', {}, async () => {
          throw new TypeError('boom');
        })
      ).rejects.toThrow('boom');

      const [span] = getFinishedSpans();
      expect(span.status).toEqual({ code: SpanStatusCode.ERROR, message: 'TypeError: boom' });
      expect(span.events.map((e) => e.name)).toEqual(['exception']);
    });

    it('should nest spans started inside another', async () => {
      initTracer();

      await traced('outer', {}, async () => {
        await traced('inner', {}, async () => undefined);
      });

      const [inner, outer] = getFinishedSpans();
      expect(inner.name).toBe('inner');
      expect(inner.parentSpanId).toBe(outer.spanContext().spanId);
    });
  });

  describe('summarizeSpans()', () => {
    it('should print one line per span', async () => {
      initTracer();

      await traced('datasource.fetch', { 'datasource.name': 'EC2 instance' }, async () => undefined);
      await expect(
        traced('llm.chat.completion', {}, async () => {
          throw new Error('timeout');
        })
      ).rejects.toThrow();

      const spans = getFinishedSpans();
      const lines = summarizeSpans(spans);

      expect(lines).toEqual([
        `datasource.fetch (EC2 instance): ${spanDurationMs(spans[0])}ms`,
        `llm.chat.completion: ${spanDurationMs(spans[1])}ms [error]`,
      ]);
    });
  });

  describe('resetTracer()', () => {
    it('should drop finished spans', async () => {
      initTracer();
      await traced('datasource.fetch', {}, async () => undefined);

      resetTracer();

      expect(getFinishedSpans()).toEqual([]);
      expect(isInitialized()).toBe(false);
    });
  });
});
