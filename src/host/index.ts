/**
 * Host Module
 *
 * Boundary types for the proxy engine that drives the tracing callbacks.
 */

export type {
  ScratchValue,
  StringFetch,
  IntegerFetch,
  SampleFetches,
  Transaction,
  StatusLine,
  HttpMessage,
  Channel,
  FilterResult,
  HttpFilter,
  ActionPhase,
  ActionHandler,
  FilterFactory,
  HostCore,
} from './types.js';

export { HostAccessError } from './errors.js';
