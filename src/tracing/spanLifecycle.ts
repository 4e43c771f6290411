/**
 * Span Lifecycle
 *
 * Drives server and client spans across the independent callbacks the proxy
 * fires for one request:
 *
 *   startServerSpan      request arrives (action)
 *   startClientSpan      request headers flow to the upstream (filter)
 *   completeClientSpan   upstream response headers arrive (filter)
 *   completeServerSpan   end of response analysis (filter or action)
 *   setSpanAttribute     any phase (action)
 *
 * The server span's context is parked in the correlation cache between
 * callbacks. A request without a cached context degrades every step to a
 * no-op; telemetry never fails a request on its own.
 */

import {
  SpanKind,
  SpanStatusCode,
  trace,
  type Attributes,
  type Context,
  type Span,
  type SpanStatus,
  type TextMapPropagator,
  type Tracer,
} from '@opentelemetry/api';
import {
  ATTR_HTTP_REQUEST_METHOD,
  ATTR_HTTP_RESPONSE_STATUS_CODE,
  ATTR_NETWORK_PEER_ADDRESS,
  ATTR_URL_PATH,
  ATTR_URL_QUERY,
} from '@opentelemetry/semantic-conventions';
import type { CorrelationCache } from '../correlation/correlationCache.js';
import { getCorrelationCache } from '../correlation/correlationCache.js';
import { readTraceId, removeContext, storeContext } from '../correlation/contextStore.js';
import type { HttpMessage, Transaction } from '../host/types.js';
import type { Logger } from '../logging/logger.js';
import type { SamplerKind } from './opentelemetryConfig.js';
import {
  collectTracingHeaders,
  createHeaderSetter,
  extractParentContext,
} from './propagation.js';
import { markServerSpanOwner, ownsServerSpan, readRequestTraceState } from './requestState.js';
import { suppressesSampledHeader } from './sampler.js';

// ─── Attribute names ─────────────────────────────────────────────────────────

export const ATTR_REQUEST_HOST = 'http.request.header.host';
export const ATTR_FRONTEND_NAME = 'haproxy.frontend.name';
export const ATTR_BACKEND_NAME = 'haproxy.backend.name';
export const ATTR_SERVER_NAME = 'haproxy.server.name';
export const ATTR_TERMINATION_STATE = 'haproxy.termination_state';

export const CLIENT_SPAN_NAME = 'upstream';
export const RESPONSE_HEADERS_EVENT = 'received response headers';
export const SERVER_ERROR_REASON = '5xx status code';

// ─── Types ───────────────────────────────────────────────────────────────────

export interface SpanLifecycleDeps {
  tracer: Tracer;
  propagator: TextMapPropagator;
  sampler: SamplerKind;
  logger: Logger;
  /** Defaults to the process-wide cache. */
  cache?: CorrelationCache<Context>;
}

/** A client span and its context, owned by one proxying attempt. */
export interface ClientSpanHandle {
  readonly span: Span;
  readonly context: Context;
}

export interface SpanLifecycle {
  startServerSpan(txn: Transaction): void;
  /** Returns `undefined` when the request has no active trace. */
  startClientSpan(txn: Transaction, msg: HttpMessage): ClientSpanHandle | undefined;
  completeClientSpan(txn: Transaction, msg: HttpMessage, handle: ClientSpanHandle): void;
  completeServerSpan(txn: Transaction): void;
  setSpanAttribute(txn: Transaction, name: string, varName: string): void;
}

// ─── Helpers ─────────────────────────────────────────────────────────────────

/** Splits `pathq` on the first `?`. */
export function splitPathQuery(pathq: string): { path: string; query: string } {
  const index = pathq.indexOf('?');
  if (index === -1) return { path: pathq, query: '' };
  return { path: pathq.slice(0, index), query: pathq.slice(index + 1) };
}

function statusFor(code: number, reason: string): SpanStatus {
  return code < 500 ? { code: SpanStatusCode.OK } : { code: SpanStatusCode.ERROR, message: reason };
}

function requestAttributes(txn: Transaction): Attributes {
  const { path, query } = splitPathQuery(txn.f.getString('pathq'));
  return {
    [ATTR_HTTP_REQUEST_METHOD]: txn.f.getString('method'),
    [ATTR_URL_PATH]: path,
    [ATTR_URL_QUERY]: query,
  };
}

// ─── Implementation ──────────────────────────────────────────────────────────

export function createSpanLifecycle(deps: SpanLifecycleDeps): SpanLifecycle {
  const { tracer, propagator } = deps;
  const cache = deps.cache ?? getCorrelationCache();
  const logger = deps.logger.child({ component: 'lifecycle' });
  const headerSetter = createHeaderSetter({
    suppressSampled: suppressesSampledHeader(deps.sampler),
  });

  function startServerSpan(txn: Transaction): void {
    const carrier = collectTracingHeaders(txn.requestHeaders());
    const parent = extractParentContext(propagator, carrier);

    // Read every host field before touching scratch or cache state.
    const method = txn.f.getString('method');
    const attributes = requestAttributes(txn);
    const host = carrier['host'] ?? '';
    const peerAddress = txn.f.getString('src');

    const span = tracer.startSpan(
      `${method} ${host}`,
      {
        kind: SpanKind.SERVER,
        startTime: Date.now(),
        attributes: {
          ...attributes,
          [ATTR_REQUEST_HOST]: host,
          [ATTR_NETWORK_PEER_ADDRESS]: peerAddress,
        },
      },
      parent,
    );
    const traceId = span.spanContext().traceId;

    const spanLogger = logger.child({ traceId });

    // A repeated start for the same request ends and replaces the earlier span.
    const previous = readRequestTraceState(txn, cache);
    if (previous.phase === 'server-span-open' && previous.ownsServerSpan) {
      cache.remove(previous.traceId);
      trace.getSpan(previous.context)?.end();
      spanLogger.debug('Replaced server span', { previousTraceId: previous.traceId });
    }

    markServerSpanOwner(txn);
    storeContext(txn, traceId, trace.setSpan(parent, span), cache);
    spanLogger.debug('Server span started');
  }

  function startClientSpan(txn: Transaction, msg: HttpMessage): ClientSpanHandle | undefined {
    const state = readRequestTraceState(txn, cache);
    if (state.phase !== 'server-span-open') {
      logger.debug('No active trace, skipping client span', { phase: state.phase });
      return undefined;
    }

    const span = tracer.startSpan(
      CLIENT_SPAN_NAME,
      { kind: SpanKind.CLIENT, attributes: requestAttributes(txn) },
      state.context,
    );
    const context = trace.setSpan(state.context, span);
    propagator.inject(context, msg, headerSetter);
    return { span, context };
  }

  function completeClientSpan(
    txn: Transaction,
    msg: HttpMessage,
    handle: ClientSpanHandle,
  ): void {
    const { span } = handle;
    try {
      span.addEvent(RESPONSE_HEADERS_EVENT);
      const { code, reason } = msg.statusLine();
      span.setAttribute(ATTR_HTTP_RESPONSE_STATUS_CODE, code);
      span.setStatus(statusFor(code, reason));
      span.setAttribute(ATTR_SERVER_NAME, txn.f.getString('srv_name'));
    } finally {
      span.end();
    }
  }

  function completeServerSpan(txn: Transaction): void {
    if (!ownsServerSpan(txn)) return;

    const context = removeContext(txn, cache);
    if (context === undefined) {
      logger.child({ traceId: readTraceId(txn) }).debug('Server span already completed or evicted');
      return;
    }
    const span = trace.getSpan(context);
    if (span === undefined) return;

    try {
      const status = txn.f.getOptionalInteger('txn_status') ?? 0;
      span.setAttribute(ATTR_HTTP_RESPONSE_STATUS_CODE, status);
      span.setStatus(statusFor(status, SERVER_ERROR_REASON));
      span.setAttribute(ATTR_FRONTEND_NAME, txn.f.getString('fe_name'));
      span.setAttribute(ATTR_BACKEND_NAME, txn.f.getString('be_name'));
      span.setAttribute(
        ATTR_TERMINATION_STATE,
        txn.f.getOptionalString('txn_sess_term_state') ?? '',
      );
    } finally {
      span.end();
    }
  }

  function setSpanAttribute(txn: Transaction, name: string, varName: string): void {
    const value = txn.getVar(varName);
    if (value === undefined) return;

    const state = readRequestTraceState(txn, cache);
    if (state.phase !== 'server-span-open') return;
    trace.getSpan(state.context)?.setAttribute(name, value);
  }

  return {
    startServerSpan,
    startClientSpan,
    completeClientSpan,
    completeServerSpan,
    setSpanAttribute,
  };
}
