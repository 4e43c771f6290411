import { describe, it, expect } from 'vitest';
import type { Context } from '@opentelemetry/api';
import { InMemorySpanExporter, SimpleSpanProcessor } from '@opentelemetry/sdk-trace-base';
import { LruCorrelationCache } from './correlation/correlationCache.js';
import {
  ACTION_END_SERVER_SPAN,
  ACTION_SET_SPAN_ATTRIBUTE,
  ACTION_START_SERVER_SPAN,
  TRACE_FILTER_NAME,
  register,
  type RegisterOptions,
} from './module.js';
import { createMockLogCollector, type MockLogCollector } from './test/mockCollectors.js';
import { FakeHostCore, FakeHttpMessage, FakeTransaction, RESPONSE_CHANNEL } from './test/fakeHost.js';
import { TelemetryInitError } from './tracing/exporters.js';

interface Harness {
  core: FakeHostCore;
  exporter: InMemorySpanExporter;
  cache: LruCorrelationCache<Context>;
  logs: MockLogCollector;
  options: RegisterOptions;
}

function createHarness(env: Record<string, string> = {}): Harness {
  const exporter = new InMemorySpanExporter();
  const cache = new LruCorrelationCache<Context>();
  const logs = createMockLogCollector();
  return {
    core: new FakeHostCore(),
    exporter,
    cache,
    logs,
    options: {
      env,
      logOutput: logs.output,
      cache,
      telemetry: { spanProcessor: new SimpleSpanProcessor(exporter), registerGlobal: false },
    },
  };
}

describe('register', () => {
  it('registers the actions and the filter', () => {
    const { core, options } = createHarness();
    register(core, {}, options);

    expect([...core.actions.keys()]).toEqual([
      ACTION_START_SERVER_SPAN,
      ACTION_SET_SPAN_ATTRIBUTE,
      ACTION_END_SERVER_SPAN,
    ]);
    expect(core.actions.get('start_server_span')).toMatchObject({ phases: ['http-req'], nargs: 0 });
    expect(core.actions.get('set_span_attribute_var')).toMatchObject({
      phases: ['http-req', 'http-res', 'http-after-res'],
      nargs: 2,
    });
    expect(core.actions.get('end_server_span')).toMatchObject({
      phases: ['http-res', 'http-after-res'],
      nargs: 0,
    });
    expect([...core.filters.keys()]).toEqual([TRACE_FILTER_NAME]);
    expect(TRACE_FILTER_NAME).toBe('opentelemetry-trace');
  });

  it('logs the startup summary', () => {
    const { core, logs, options } = createHarness();
    register(core, { name: 'edge', sampler: 'AlwaysOn', propagator: 'zipkin' }, options);

    const info = logs.atLevel('info');
    expect(info).toHaveLength(1);
    expect(info[0]?.message).toBe(
      'OpenTelemetry initialized: service=edge protocol=http/protobuf (default) ' +
        'endpoint=http://localhost:4318/v1/traces (default) propagator=zipkin sampler=always-on log_level=info',
    );
  });

  it('reports unrecognized settings while resolving configuration', () => {
    const { core, logs, options } = createHarness({ OTEL_LOG_LEVEL: 'loud' });
    const tracing = register(core, {}, options);

    expect(tracing.config.logLevel.value).toBe('info');
    expect(logs.atLevel('warn')[0]).toMatchObject({
      message: 'Ignoring unrecognized log level',
      component: 'config',
    });
  });

  it.each(['warn', 'error'])('prints the startup summary at log level %s', (level) => {
    const { core, logs, options } = createHarness({ OTEL_LOG_LEVEL: level });
    register(core, {}, options);

    expect(logs.entries).toHaveLength(1);
    expect(logs.entries[0]).toMatchObject({
      level: 'info',
      message:
        'OpenTelemetry initialized: service=haproxy protocol=http/protobuf (default) ' +
        `endpoint=http://localhost:4318/v1/traces (default) propagator=w3c sampler=parent-based log_level=${level}`,
    });
  });

  it('honours the resolved log level after startup', () => {
    const { core, logs, options } = createHarness({ OTEL_LOG_LEVEL: 'error' });
    const tracing = register(core, {}, options);
    const txn = new FakeTransaction();

    core.runAction(ACTION_START_SERVER_SPAN, txn);
    core.runAction(ACTION_END_SERVER_SPAN, txn);
    core.runAction(ACTION_END_SERVER_SPAN, txn);

    expect(tracing.logger.level).toBe('error');
    expect(logs.entries.map((e) => e.message)).toEqual([
      expect.stringMatching(/^OpenTelemetry initialized: /),
    ]);
  });

  it('registers nothing when the exporter cannot be built', () => {
    const core = new FakeHostCore();
    const logs = createMockLogCollector();

    expect(() =>
      register(
        core,
        { otlp: { protocol: 'grpc', endpoint: 'not a url' } },
        { env: {}, logOutput: logs.output, telemetry: { registerGlobal: false } },
      ),
    ).toThrow(TelemetryInitError);
    expect(core.actions.size).toBe(0);
    expect(core.filters.size).toBe(0);
  });

  describe('through the host hooks', () => {
    it('traces a request driven by the actions and the filter', async () => {
      const { core, exporter, cache, options } = createHarness();
      const tracing = register(core, { sampler: 'AlwaysOn', propagator: 'w3c' }, options);
      const txn = new FakeTransaction();
      const filter = core.createFilter(TRACE_FILTER_NAME);
      const upstream = FakeHttpMessage.request();
      txn.setVar('txn.user_tier', 'gold');

      core.runAction(ACTION_START_SERVER_SPAN, txn);
      core.runAction(ACTION_SET_SPAN_ATTRIBUTE, txn, 'user.tier', 'txn.user_tier');
      filter.httpHeaders(txn, upstream);
      filter.httpHeaders(txn, FakeHttpMessage.response(200, 'OK'));
      filter.endAnalyze(txn, RESPONSE_CHANNEL);
      await tracing.runtime.forceFlush();

      const spans = exporter.getFinishedSpans();
      expect(spans.map((s) => s.name)).toEqual(['upstream', 'GET shop.example']);
      expect(spans[1]?.attributes['user.tier']).toBe('gold');
      expect(upstream.headers.has('traceparent')).toBe(true);
      expect(cache.size).toBe(0);
      await tracing.shutdown();
    });

    it('honours the filter argument that disables client spans', async () => {
      const { core, exporter, options } = createHarness();
      const tracing = register(core, {}, options);
      const txn = new FakeTransaction();
      const filter = core.createFilter(TRACE_FILTER_NAME, 'start_client_span=false');
      const upstream = FakeHttpMessage.request();

      core.runAction(ACTION_START_SERVER_SPAN, txn);
      filter.httpHeaders(txn, upstream);
      filter.endAnalyze(txn, RESPONSE_CHANNEL);
      await tracing.runtime.forceFlush();

      expect(exporter.getFinishedSpans().map((s) => s.name)).toEqual(['GET shop.example']);
      expect(upstream.headers.size).toBe(0);
    });

    it('completes the server span from the end action', async () => {
      const { core, exporter, cache, options } = createHarness();
      const tracing = register(core, {}, options);
      const txn = new FakeTransaction();
      const filter = core.createFilter(TRACE_FILTER_NAME, 'start_client_span=false');

      core.runAction(ACTION_START_SERVER_SPAN, txn);
      core.runAction(ACTION_END_SERVER_SPAN, txn);
      expect(cache.size).toBe(0);

      filter.endAnalyze(txn, RESPONSE_CHANNEL);
      await tracing.runtime.forceFlush();

      expect(exporter.getFinishedSpans()).toHaveLength(1);
    });

    it('ignores the attribute action when arguments are missing', async () => {
      const { core, exporter, options } = createHarness();
      const tracing = register(core, {}, options);
      const txn = new FakeTransaction();
      txn.setVar('txn.user_tier', 'gold');

      core.runAction(ACTION_START_SERVER_SPAN, txn);
      core.runAction(ACTION_SET_SPAN_ATTRIBUTE, txn, 'user.tier');
      core.runAction(ACTION_END_SERVER_SPAN, txn);
      await tracing.runtime.forceFlush();

      expect(exporter.getFinishedSpans()[0]?.attributes).not.toHaveProperty('user.tier');
    });
  });
});
