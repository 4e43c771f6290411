/**
 * Context Propagation
 *
 * Propagator selection, the header allow-list used for parent extraction,
 * and the header setter used when injecting into upstream requests.
 */

import {
  ROOT_CONTEXT,
  defaultTextMapGetter,
  type Context,
  type TextMapPropagator,
  type TextMapSetter,
} from '@opentelemetry/api';
import { W3CTraceContextPropagator } from '@opentelemetry/core';
import { B3InjectEncoding, B3Propagator } from '@opentelemetry/propagator-b3';
import { JaegerPropagator } from '@opentelemetry/propagator-jaeger';
import type { HttpMessage } from '../host/types.js';
import type { PropagatorKind } from './opentelemetryConfig.js';

export const B3_SAMPLED_HEADER = 'x-b3-sampled';

export function createPropagator(kind: PropagatorKind): TextMapPropagator {
  switch (kind) {
    case 'w3c':
      return new W3CTraceContextPropagator();
    case 'zipkin':
      return new B3Propagator({ injectEncoding: B3InjectEncoding.MULTI_HEADER });
    case 'jaeger':
      return new JaegerPropagator();
  }
}

/**
 * Headers that may carry trace context, plus `host` which feeds the server
 * span name. Nothing else reaches the propagator.
 */
export function isTracingHeader(name: string): boolean {
  return (
    name === 'host' ||
    name === 'traceparent' ||
    name === 'tracestate' ||
    name === 'b3' ||
    name.startsWith('x-b3') ||
    name.startsWith('uber')
  );
}

/**
 * Collects the allow-listed request headers into a carrier, keeping the
 * first value of each.
 */
export function collectTracingHeaders(
  headers: Iterable<readonly [name: string, values: readonly string[]]>,
): Record<string, string> {
  const carrier: Record<string, string> = {};
  for (const [rawName, values] of headers) {
    const name = rawName.toLowerCase();
    const first = values[0];
    if (first !== undefined && isTracingHeader(name)) {
      carrier[name] = first;
    }
  }
  return carrier;
}

/**
 * Parent context carried by the incoming headers, or the root context when
 * they carry none.
 */
export function extractParentContext(
  propagator: TextMapPropagator,
  carrier: Record<string, string>,
): Context {
  return propagator.extract(ROOT_CONTEXT, carrier, defaultTextMapGetter);
}

export interface HeaderSetterOptions {
  suppressSampled: boolean;
}

export function createHeaderSetter(options: HeaderSetterOptions): TextMapSetter<HttpMessage> {
  return {
    set(msg: HttpMessage, key: string, value: string): void {
      if (options.suppressSampled && key.toLowerCase() === B3_SAMPLED_HEADER) return;
      msg.setHeader(key, value);
    },
  };
}
