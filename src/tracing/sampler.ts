/**
 * Trace Sampler
 *
 * Maps the named sampling strategies onto OpenTelemetry samplers.
 *
 * `silent-on` records every trace like `always-on`, but outgoing requests do
 * not carry the B3 sampled flag, so downstream services keep their own
 * sampling decision while still seeing the trace linkage.
 */

import {
  AlwaysOffSampler,
  AlwaysOnSampler,
  ParentBasedSampler,
  type Sampler,
} from '@opentelemetry/sdk-trace-base';
import type { SamplerKind } from './opentelemetryConfig.js';

export function createSampler(kind: SamplerKind): Sampler {
  switch (kind) {
    case 'always-on':
    case 'silent-on':
      return new AlwaysOnSampler();
    case 'always-off':
      return new AlwaysOffSampler();
    case 'parent-based':
      return new ParentBasedSampler({ root: new AlwaysOnSampler() });
  }
}

/** Whether injection must leave out the single-bit sampling header. */
export function suppressesSampledHeader(kind: SamplerKind): boolean {
  return kind === 'silent-on';
}
