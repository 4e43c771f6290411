/**
 * haproxy-trace-bridge – public entry point
 *
 * Correlates spans across the proxy's stateless callbacks and ships them
 * through an OTLP export pipeline.
 *
 * @module haproxy-trace-bridge
 */

// ─── Registration ───
export {
  type RegisterOptions,
  type TracingModule,
  ACTION_START_SERVER_SPAN,
  ACTION_SET_SPAN_ATTRIBUTE,
  ACTION_END_SERVER_SPAN,
  TRACE_FILTER_NAME,
  register,
} from './module.js';

// ─── Tracing ───
export * from './tracing/index.js';

// ─── Correlation ───
export * from './correlation/index.js';

// ─── Host boundary ───
export * from './host/index.js';

// ─── Logging ───
export * from './logging/index.js';
