/**
 * Module registration.
 *
 * Resolves configuration, builds the export pipeline and wires the span
 * lifecycle onto the host's actions and filter. Exporter failures abort
 * registration before any hook is installed.
 *
 * @module module
 */

import type { Context } from '@opentelemetry/api';
import type { CorrelationCache } from './correlation/correlationCache.js';
import type { HostCore } from './host/types.js';
import { createLogger, type Logger, type LogOutput } from './logging/logger.js';
import {
  formatStartupSummary,
  resolveConfig,
  type Environment,
  type ModuleOptions,
  type ResolvedConfig,
} from './tracing/opentelemetryConfig.js';
import {
  initTelemetry,
  type TelemetryInitOptions,
  type TelemetryRuntime,
} from './tracing/exporters.js';
import { createSpanLifecycle, type SpanLifecycle } from './tracing/spanLifecycle.js';
import { createTraceFilter, parseFilterArgs } from './tracing/traceFilter.js';

export const ACTION_START_SERVER_SPAN = 'start_server_span';
export const ACTION_SET_SPAN_ATTRIBUTE = 'set_span_attribute_var';
export const ACTION_END_SERVER_SPAN = 'end_server_span';
export const TRACE_FILTER_NAME = 'opentelemetry-trace';

export interface RegisterOptions {
  /** Environment overrides. Defaults to `process.env`. */
  env?: Environment;
  /** Log sink. Defaults to JSON on stdout. */
  logOutput?: LogOutput;
  telemetry?: TelemetryInitOptions;
  /** Defaults to the process-wide correlation cache. */
  cache?: CorrelationCache<Context>;
}

export interface TracingModule {
  readonly config: ResolvedConfig;
  readonly runtime: TelemetryRuntime;
  readonly lifecycle: SpanLifecycle;
  readonly logger: Logger;
  /** Flushes pending spans and stops the export pipeline. */
  shutdown(): Promise<void>;
}

export function register(
  core: HostCore,
  options: ModuleOptions = {},
  registerOptions: RegisterOptions = {},
): TracingModule {
  const env = registerOptions.env ?? process.env;
  const output = registerOptions.logOutput;

  const config = resolveConfig(
    options,
    env,
    createLogger({ output, context: { component: 'config' } }),
  );
  const logger = createLogger({ level: config.logLevel.value, output });

  const runtime = initTelemetry(config, registerOptions.telemetry);
  // The summary is printed at every verbosity.
  createLogger({ level: 'info', output }).info(formatStartupSummary(config));

  const lifecycle = createSpanLifecycle({
    tracer: runtime.tracer,
    propagator: runtime.propagator,
    sampler: runtime.sampler,
    logger,
    cache: registerOptions.cache,
  });

  core.registerAction(ACTION_START_SERVER_SPAN, ['http-req'], 0, (txn) => {
    lifecycle.startServerSpan(txn);
  });
  core.registerAction(
    ACTION_SET_SPAN_ATTRIBUTE,
    ['http-req', 'http-res', 'http-after-res'],
    2,
    (txn, [name, varName]) => {
      if (name === undefined || varName === undefined) return;
      lifecycle.setSpanAttribute(txn, name, varName);
    },
  );
  core.registerAction(ACTION_END_SERVER_SPAN, ['http-res', 'http-after-res'], 0, (txn) => {
    lifecycle.completeServerSpan(txn);
  });
  core.registerFilter(TRACE_FILTER_NAME, (args) =>
    createTraceFilter(lifecycle, parseFilterArgs(args)),
  );

  return {
    config,
    runtime,
    lifecycle,
    logger,
    async shutdown(): Promise<void> {
      await runtime.shutdown();
    },
  };
}
