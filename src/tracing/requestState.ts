/**
 * Per-request trace state.
 *
 * The host only offers flat scratch variables, so the state is rebuilt on
 * every callback from two of them (`txn.otel_trace_id` and
 * `txn.__otel_server_span`) and from the presence of a cache entry.
 */

import type { Context } from '@opentelemetry/api';
import type { CorrelationCache } from '../correlation/correlationCache.js';
import { readTraceId } from '../correlation/contextStore.js';
import type { Transaction } from '../host/types.js';

export const SERVER_SPAN_VAR = 'txn.__otel_server_span';

export type RequestTraceState =
  | { readonly phase: 'no-trace' }
  | {
      readonly phase: 'server-span-open';
      readonly traceId: string;
      readonly context: Context;
      /** Set only on the request that started the server span; it must close it. */
      readonly ownsServerSpan: boolean;
    }
  | {
      /** Completed, or evicted before completion. */
      readonly phase: 'server-span-closed';
      readonly traceId: string;
      readonly ownsServerSpan: boolean;
    };

export function ownsServerSpan(txn: Transaction): boolean {
  return txn.getVar(SERVER_SPAN_VAR) === true;
}

export function markServerSpanOwner(txn: Transaction): void {
  txn.setVar(SERVER_SPAN_VAR, true);
}

export function readRequestTraceState(
  txn: Transaction,
  cache: CorrelationCache<Context>,
): RequestTraceState {
  const traceId = readTraceId(txn);
  if (traceId === undefined) {
    return { phase: 'no-trace' };
  }
  const owner = ownsServerSpan(txn);
  const context = cache.get(traceId);
  if (context === undefined) {
    return { phase: 'server-span-closed', traceId, ownsServerSpan: owner };
  }
  return { phase: 'server-span-open', traceId, context, ownsServerSpan: owner };
}
