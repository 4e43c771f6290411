/**
 * Exporter Bootstrap
 *
 * Builds the export pipeline once per process from the resolved
 * configuration: OTLP exporter for the chosen protocol, batch span
 * processor, sampler, propagator and tracer provider. Spans handed to the
 * pipeline are queued and flushed in the background; request callbacks never
 * wait on export.
 */

import { propagation, trace, type TextMapPropagator, type Tracer } from '@opentelemetry/api';
import { OTLPTraceExporter as GrpcTraceExporter } from '@opentelemetry/exporter-trace-otlp-grpc';
import { OTLPTraceExporter as JsonTraceExporter } from '@opentelemetry/exporter-trace-otlp-http';
import { OTLPTraceExporter as ProtobufTraceExporter } from '@opentelemetry/exporter-trace-otlp-proto';
import { Resource } from '@opentelemetry/resources';
import {
  BasicTracerProvider,
  BatchSpanProcessor,
  type BufferConfig,
  type SpanExporter,
  type SpanProcessor,
} from '@opentelemetry/sdk-trace-base';
import { ATTR_SERVICE_NAME } from '@opentelemetry/semantic-conventions';
import type { OtlpProtocol, ResolvedConfig, SamplerKind } from './opentelemetryConfig.js';
import { createPropagator } from './propagation.js';
import { createSampler } from './sampler.js';

export const TRACER_NAME = 'haproxy-otel';

// ─── Errors ──────────────────────────────────────────────────────────────────

/**
 * Raised when the export pipeline cannot be built. Fatal to module
 * activation.
 */
export class TelemetryInitError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TelemetryInitError';
  }
}

// ─── Exporter ────────────────────────────────────────────────────────────────

function assertValidEndpoint(endpoint: string): void {
  let url: URL;
  try {
    url = new URL(endpoint);
  } catch (error) {
    throw new TelemetryInitError(`Invalid OTLP endpoint: ${endpoint}`, { cause: error });
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new TelemetryInitError(
      `Unsupported OTLP endpoint scheme ${url.protocol} in ${endpoint}`,
    );
  }
}

function buildExporter(protocol: OtlpProtocol, url: string): SpanExporter {
  switch (protocol) {
    case 'grpc':
      return new GrpcTraceExporter({ url });
    case 'http/protobuf':
      return new ProtobufTraceExporter({ url });
    case 'http/json':
      return new JsonTraceExporter({ url });
  }
}

/**
 * Creates the OTLP span exporter for the resolved protocol and endpoint.
 */
export function createSpanExporter(config: ResolvedConfig): SpanExporter {
  const protocol = config.protocol.value;
  const endpoint = config.endpoint.value;
  assertValidEndpoint(endpoint);
  try {
    return buildExporter(protocol, endpoint);
  } catch (error) {
    throw new TelemetryInitError(`Failed to create ${protocol} exporter for ${endpoint}`, {
      cause: error,
    });
  }
}

// ─── Runtime ─────────────────────────────────────────────────────────────────

export interface TelemetryInitOptions {
  /** Use this exporter instead of building one from the configuration. */
  exporter?: SpanExporter;
  /** Use this processor instead of batching the exporter. */
  spanProcessor?: SpanProcessor;
  /** Batch processor tuning; the SDK defaults apply otherwise. */
  batch?: BufferConfig;
  /** Install the provider and propagator as process globals. Defaults to true. */
  registerGlobal?: boolean;
}

export interface TelemetryRuntime {
  readonly tracer: Tracer;
  readonly propagator: TextMapPropagator;
  readonly sampler: SamplerKind;
  readonly provider: BasicTracerProvider;
  forceFlush(): Promise<void>;
  shutdown(): Promise<void>;
}

let globalsInstalled = false;

/**
 * Builds the tracing pipeline. Throws {@link TelemetryInitError} when the
 * exporter cannot be created.
 */
export function initTelemetry(
  config: ResolvedConfig,
  options: TelemetryInitOptions = {},
): TelemetryRuntime {
  const spanProcessor =
    options.spanProcessor ??
    new BatchSpanProcessor(options.exporter ?? createSpanExporter(config), options.batch);

  const provider = new BasicTracerProvider({
    resource: new Resource({ [ATTR_SERVICE_NAME]: config.serviceName.value }),
    sampler: createSampler(config.sampler.value),
    spanProcessors: [spanProcessor],
  });
  const propagator = createPropagator(config.propagator.value);

  if ((options.registerGlobal ?? true) && !globalsInstalled) {
    trace.setGlobalTracerProvider(provider);
    propagation.setGlobalPropagator(propagator);
    globalsInstalled = true;
  }

  return {
    tracer: provider.getTracer(TRACER_NAME),
    propagator,
    sampler: config.sampler.value,
    provider,
    forceFlush: () => provider.forceFlush(),
    shutdown: () => provider.shutdown(),
  };
}
