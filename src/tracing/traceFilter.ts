/**
 * HTTP trace filter.
 *
 * One instance per stream. It owns the client span of the current proxying
 * attempt, which never enters the correlation cache.
 */

import type { Channel, FilterResult, HttpFilter, HttpMessage, Transaction } from '../host/types.js';
import type { ClientSpanHandle, SpanLifecycle } from './spanLifecycle.js';

export interface TraceFilterOptions {
  /** Create client spans around upstream calls. Defaults to true. */
  startClientSpan: boolean;
}

type ClientSpanState =
  | { phase: 'idle' }
  | { phase: 'open'; handle: ClientSpanHandle }
  | { phase: 'closed' };

/**
 * Parses the filter argument string, a `;`-separated list of `key=value`
 * pairs. A `start_client_span` value other than `false` counts as true.
 */
export function parseFilterArgs(args: string | undefined): TraceFilterOptions {
  const options: TraceFilterOptions = { startClientSpan: true };
  if (!args) return options;

  for (const pair of args.split(';')) {
    const separator = pair.indexOf('=');
    if (separator === -1) continue;
    const name = pair.slice(0, separator).trim();
    const value = pair.slice(separator + 1).trim();
    if (name === 'start_client_span') {
      options.startClientSpan = value !== 'false';
    }
  }
  return options;
}

export function createTraceFilter(lifecycle: SpanLifecycle, options: TraceFilterOptions): HttpFilter {
  let client: ClientSpanState = { phase: 'idle' };

  function onRequestHeaders(txn: Transaction, msg: HttpMessage): void {
    if (!options.startClientSpan) return;

    // A new proxying attempt supersedes one still waiting for its response.
    if (client.phase === 'open') {
      client.handle.span.end();
      client = { phase: 'closed' };
    }

    const handle = lifecycle.startClientSpan(txn, msg);
    if (handle) {
      client = { phase: 'open', handle };
    }
  }

  function onResponseHeaders(txn: Transaction, msg: HttpMessage): void {
    if (client.phase !== 'open') return;
    const { handle } = client;
    client = { phase: 'closed' };
    lifecycle.completeClientSpan(txn, msg, handle);
  }

  return {
    httpHeaders(txn: Transaction, msg: HttpMessage): FilterResult {
      if (msg.isResponse()) {
        onResponseHeaders(txn, msg);
      } else {
        onRequestHeaders(txn, msg);
      }
      return 'continue';
    },

    endAnalyze(txn: Transaction, channel: Channel): FilterResult {
      if (!channel.isResponse()) return 'continue';

      // The upstream never answered.
      if (client.phase === 'open') {
        client.handle.span.end();
        client = { phase: 'closed' };
      }

      lifecycle.completeServerSpan(txn);
      return 'continue';
    },
  };
}
