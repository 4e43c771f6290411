/**
 * Tracing Module
 *
 * Configuration resolution, exporter bootstrap and the span lifecycle that
 * spans the proxy's request callbacks.
 */

export {
  type OtlpProtocol,
  type SamplerKind,
  type PropagatorKind,
  type ConfigSource,
  type Resolved,
  type ModuleOptions,
  type Environment,
  type ResolvedConfig,
  ENV_VARS,
  DEFAULT_SERVICE_NAME,
  DEFAULT_PROTOCOL,
  DEFAULT_SAMPLER,
  DEFAULT_PROPAGATOR,
  DEFAULT_LOG_LEVEL,
  parseProtocol,
  parseSampler,
  parsePropagator,
  parseLogLevel,
  buildTracesEndpoint,
  resolveServiceName,
  resolveProtocol,
  resolveEndpoint,
  resolveSampler,
  resolvePropagator,
  resolveLogLevel,
  resolveConfig,
  formatStartupSummary,
} from './opentelemetryConfig.js';

export {
  type TelemetryInitOptions,
  type TelemetryRuntime,
  TRACER_NAME,
  TelemetryInitError,
  createSpanExporter,
  initTelemetry,
} from './exporters.js';

export { createSampler, suppressesSampledHeader } from './sampler.js';

export {
  type HeaderSetterOptions,
  B3_SAMPLED_HEADER,
  createPropagator,
  isTracingHeader,
  collectTracingHeaders,
  extractParentContext,
  createHeaderSetter,
} from './propagation.js';

export {
  type RequestTraceState,
  SERVER_SPAN_VAR,
  ownsServerSpan,
  markServerSpanOwner,
  readRequestTraceState,
} from './requestState.js';

export {
  type SpanLifecycleDeps,
  type ClientSpanHandle,
  type SpanLifecycle,
  ATTR_REQUEST_HOST,
  ATTR_FRONTEND_NAME,
  ATTR_BACKEND_NAME,
  ATTR_SERVER_NAME,
  ATTR_TERMINATION_STATE,
  CLIENT_SPAN_NAME,
  RESPONSE_HEADERS_EVENT,
  SERVER_ERROR_REASON,
  splitPathQuery,
  createSpanLifecycle,
} from './spanLifecycle.js';

export { type TraceFilterOptions, parseFilterArgs, createTraceFilter } from './traceFilter.js';
