/**
 * Transaction-bound access to the correlation cache.
 *
 * The cache key travels with the request in the `txn.otel_trace_id` scratch
 * variable, so any later callback of the same request can recover it.
 */

import type { Context } from '@opentelemetry/api';
import type { Transaction } from '../host/types.js';
import { getCorrelationCache, type CorrelationCache } from './correlationCache.js';

/** Tracing context shared by every callback of one request. */
export type TraceContext = Context;

export const TRACE_ID_VAR = 'txn.otel_trace_id';

/** Hex trace identifier recorded for this request, if any. */
export function readTraceId(txn: Transaction): string | undefined {
  const value = txn.getVar(TRACE_ID_VAR);
  return typeof value === 'string' && value !== '' ? value : undefined;
}

export function storeContext(
  txn: Transaction,
  traceId: string,
  context: TraceContext,
  cache: CorrelationCache<TraceContext> = getCorrelationCache(),
): void {
  const key = traceId.toLowerCase();
  txn.setVar(TRACE_ID_VAR, key);
  cache.store(key, context);
}

export function getContext(
  txn: Transaction,
  cache: CorrelationCache<TraceContext> = getCorrelationCache(),
): TraceContext | undefined {
  const traceId = readTraceId(txn);
  return traceId === undefined ? undefined : cache.get(traceId);
}

export function removeContext(
  txn: Transaction,
  cache: CorrelationCache<TraceContext> = getCorrelationCache(),
): TraceContext | undefined {
  const traceId = readTraceId(txn);
  return traceId === undefined ? undefined : cache.remove(traceId);
}
