/**
 * OpenTelemetry Configuration
 *
 * Resolves exporter protocol, endpoint, sampler, propagator, service name and
 * log verbosity from the module options and the process environment. Every
 * setting walks the same chain and stops at the first recognised, non-empty
 * value:
 *
 *   explicit module option > signal-specific env > general env > default
 *
 * The resolver never throws. Unrecognised values are reported through the
 * optional logger and skipped.
 */

import type { Logger, LogLevel } from '../logging/logger.js';

// ─── Types ───────────────────────────────────────────────────────────────────

export type OtlpProtocol = 'grpc' | 'http/protobuf' | 'http/json';
export type SamplerKind = 'always-on' | 'silent-on' | 'always-off' | 'parent-based';
export type PropagatorKind = 'w3c' | 'zipkin' | 'jaeger';

/** Which source produced a resolved value. */
export type ConfigSource = 'explicit' | 'signal-env' | 'general-env' | 'default';

export interface Resolved<T> {
  readonly value: T;
  readonly source: ConfigSource;
}

/** Options table handed over by the embedding configuration. All keys optional. */
export interface ModuleOptions {
  name?: string;
  sampler?: string;
  propagator?: string;
  log_level?: string;
  otlp?: {
    endpoint?: string;
    protocol?: string;
  };
}

export type Environment = Readonly<Record<string, string | undefined>>;

export interface ResolvedConfig {
  readonly serviceName: Resolved<string>;
  readonly protocol: Resolved<OtlpProtocol>;
  readonly endpoint: Resolved<string>;
  readonly propagator: Resolved<PropagatorKind>;
  readonly sampler: Resolved<SamplerKind>;
  readonly logLevel: Resolved<LogLevel>;
}

// ─── Constants ───────────────────────────────────────────────────────────────

export const ENV_VARS = {
  serviceName: 'OTEL_SERVICE_NAME',
  tracesProtocol: 'OTEL_EXPORTER_OTLP_TRACES_PROTOCOL',
  protocol: 'OTEL_EXPORTER_OTLP_PROTOCOL',
  tracesEndpoint: 'OTEL_EXPORTER_OTLP_TRACES_ENDPOINT',
  endpoint: 'OTEL_EXPORTER_OTLP_ENDPOINT',
  tracesSampler: 'OTEL_TRACES_SAMPLER',
  propagators: 'OTEL_PROPAGATORS',
  tracesLogLevel: 'OTEL_TRACES_LOG_LEVEL',
  logLevel: 'OTEL_LOG_LEVEL',
} as const;

export const DEFAULT_SERVICE_NAME = 'haproxy';
export const DEFAULT_PROTOCOL: OtlpProtocol = 'http/protobuf';
export const DEFAULT_SAMPLER: SamplerKind = 'parent-based';
export const DEFAULT_PROPAGATOR: PropagatorKind = 'w3c';
export const DEFAULT_LOG_LEVEL: LogLevel = 'info';

const DEFAULT_ENDPOINTS: Record<OtlpProtocol, string> = {
  grpc: 'http://localhost:4317',
  'http/protobuf': 'http://localhost:4318',
  'http/json': 'http://localhost:4318',
};

const TRACES_PATH = 'v1/traces';

const PROTOCOL_TOKENS: ReadonlyMap<string, OtlpProtocol> = new Map([
  ['grpc', 'grpc'],
  ['http/protobuf', 'http/protobuf'],
  ['http/json', 'http/json'],
  // legacy names
  ['binary', 'http/protobuf'],
  ['json', 'http/json'],
]);

const SAMPLER_TOKENS: ReadonlyMap<string, SamplerKind> = new Map([
  ['always-on', 'always-on'],
  ['alwayson', 'always-on'],
  ['always_on', 'always-on'],
  ['silent-on', 'silent-on'],
  ['silenton', 'silent-on'],
  ['silent_on', 'silent-on'],
  ['always-off', 'always-off'],
  ['alwaysoff', 'always-off'],
  ['always_off', 'always-off'],
  ['parent-based', 'parent-based'],
  ['parentbased', 'parent-based'],
  ['parentbased_always_on', 'parent-based'],
]);

const PROPAGATOR_TOKENS: ReadonlyMap<string, PropagatorKind> = new Map([
  ['w3c', 'w3c'],
  ['tracecontext', 'w3c'],
  ['zipkin', 'zipkin'],
  ['b3', 'zipkin'],
  ['b3multi', 'zipkin'],
  ['jaeger', 'jaeger'],
]);

const LOG_LEVEL_TOKENS: ReadonlyMap<string, LogLevel> = new Map([
  ['trace', 'debug'],
  ['debug', 'debug'],
  ['info', 'info'],
  ['warn', 'warn'],
  ['warning', 'warn'],
  ['error', 'error'],
  ['fatal', 'error'],
  ['none', 'error'],
]);

// ─── Parsers ─────────────────────────────────────────────────────────────────

export function parseProtocol(raw: string): OtlpProtocol | undefined {
  return PROTOCOL_TOKENS.get(raw.toLowerCase());
}

export function parseSampler(raw: string): SamplerKind | undefined {
  return SAMPLER_TOKENS.get(raw.toLowerCase());
}

/** Accepts a single name or an OTEL_PROPAGATORS-style list; the first known entry wins. */
export function parsePropagator(raw: string): PropagatorKind | undefined {
  for (const entry of raw.split(',')) {
    const kind = PROPAGATOR_TOKENS.get(entry.trim().toLowerCase());
    if (kind) return kind;
  }
  return undefined;
}

export function parseLogLevel(raw: string): LogLevel | undefined {
  return LOG_LEVEL_TOKENS.get(raw.trim().toLowerCase());
}

// ─── Layered Resolution ──────────────────────────────────────────────────────

interface ConfigLayer {
  source: Exclude<ConfigSource, 'default'>;
  /** Where the value came from, for diagnostics. */
  origin: string;
  raw: string | undefined;
}

type UnrecognizedHandler = (layer: ConfigLayer) => void;

/**
 * Walks the layers in order and returns the first one that parses.
 * Empty strings count as unset.
 */
function resolveSetting<T>(
  layers: readonly ConfigLayer[],
  parse: (raw: string) => T | undefined,
  fallback: T,
  onUnrecognized?: UnrecognizedHandler,
): Resolved<T> {
  for (const layer of layers) {
    if (layer.raw === undefined || layer.raw === '') continue;
    const value = parse(layer.raw);
    if (value !== undefined) return { value, source: layer.source };
    onUnrecognized?.(layer);
  }
  return { value: fallback, source: 'default' };
}

function warnUnrecognized(logger: Logger | undefined, setting: string): UnrecognizedHandler | undefined {
  if (!logger) return undefined;
  return (layer) => {
    logger.warn(`Ignoring unrecognized ${setting}`, { origin: layer.origin, value: layer.raw });
  };
}

function explicit(origin: string, raw: string | undefined): ConfigLayer {
  return { source: 'explicit', origin, raw };
}

function signalEnv(env: Environment, name: string): ConfigLayer {
  return { source: 'signal-env', origin: name, raw: env[name] };
}

function generalEnv(env: Environment, name: string): ConfigLayer {
  return { source: 'general-env', origin: name, raw: env[name] };
}

export function resolveServiceName(options: ModuleOptions, env: Environment): Resolved<string> {
  return resolveSetting(
    [explicit('name', options.name), generalEnv(env, ENV_VARS.serviceName)],
    (raw) => raw,
    DEFAULT_SERVICE_NAME,
  );
}

export function resolveProtocol(
  options: ModuleOptions,
  env: Environment,
  logger?: Logger,
): Resolved<OtlpProtocol> {
  return resolveSetting(
    [
      explicit('otlp.protocol', options.otlp?.protocol),
      signalEnv(env, ENV_VARS.tracesProtocol),
      generalEnv(env, ENV_VARS.protocol),
    ],
    parseProtocol,
    DEFAULT_PROTOCOL,
    warnUnrecognized(logger, 'OTLP protocol'),
  );
}

/**
 * Joins the traces path onto a base URL for the HTTP protocols. gRPC
 * endpoints are used as they are.
 */
export function buildTracesEndpoint(base: string, protocol: OtlpProtocol): string {
  if (protocol === 'grpc') return base;
  return `${base.replace(/\/+$/, '')}/${TRACES_PATH}`;
}

export function resolveEndpoint(
  options: ModuleOptions,
  env: Environment,
  protocol: OtlpProtocol,
): Resolved<string> {
  const base = resolveSetting(
    [
      explicit('otlp.endpoint', options.otlp?.endpoint),
      signalEnv(env, ENV_VARS.tracesEndpoint),
      generalEnv(env, ENV_VARS.endpoint),
    ],
    (raw) => raw,
    DEFAULT_ENDPOINTS[protocol],
  );
  // A traces-specific endpoint is already fully qualified.
  if (base.source === 'signal-env') return base;
  return { value: buildTracesEndpoint(base.value, protocol), source: base.source };
}

export function resolveSampler(
  options: ModuleOptions,
  env: Environment,
  logger?: Logger,
): Resolved<SamplerKind> {
  return resolveSetting(
    [explicit('sampler', options.sampler), signalEnv(env, ENV_VARS.tracesSampler)],
    parseSampler,
    DEFAULT_SAMPLER,
    warnUnrecognized(logger, 'sampler'),
  );
}

export function resolvePropagator(
  options: ModuleOptions,
  env: Environment,
  logger?: Logger,
): Resolved<PropagatorKind> {
  return resolveSetting(
    [explicit('propagator', options.propagator), generalEnv(env, ENV_VARS.propagators)],
    parsePropagator,
    DEFAULT_PROPAGATOR,
    warnUnrecognized(logger, 'propagator'),
  );
}

export function resolveLogLevel(
  options: ModuleOptions,
  env: Environment,
  logger?: Logger,
): Resolved<LogLevel> {
  return resolveSetting(
    [
      explicit('log_level', options.log_level),
      signalEnv(env, ENV_VARS.tracesLogLevel),
      generalEnv(env, ENV_VARS.logLevel),
    ],
    parseLogLevel,
    DEFAULT_LOG_LEVEL,
    warnUnrecognized(logger, 'log level'),
  );
}

/**
 * Resolves every setting into one frozen snapshot.
 */
export function resolveConfig(
  options: ModuleOptions = {},
  env: Environment = process.env,
  logger?: Logger,
): ResolvedConfig {
  const protocol = resolveProtocol(options, env, logger);
  return Object.freeze({
    serviceName: resolveServiceName(options, env),
    protocol,
    endpoint: resolveEndpoint(options, env, protocol.value),
    propagator: resolvePropagator(options, env, logger),
    sampler: resolveSampler(options, env, logger),
    logLevel: resolveLogLevel(options, env, logger),
  });
}

/**
 * One-line startup diagnostic.
 */
export function formatStartupSummary(config: ResolvedConfig): string {
  return [
    'OpenTelemetry initialized:',
    `service=${config.serviceName.value}`,
    `protocol=${config.protocol.value} (${config.protocol.source})`,
    `endpoint=${config.endpoint.value} (${config.endpoint.source})`,
    `propagator=${config.propagator.value}`,
    `sampler=${config.sampler.value}`,
    `log_level=${config.logLevel.value}`,
  ].join(' ');
}
