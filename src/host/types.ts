/**
 * Host proxy boundary.
 *
 * The proxy engine calls into this module from independent callbacks. These
 * interfaces describe the slice of its transaction model the tracing code
 * touches; the embedding layer adapts the real objects to them.
 *
 * @module host/types
 */

/** Values a transaction scratch variable may hold. */
export type ScratchValue = string | boolean | number;

export type StringFetch =
  | 'method'
  | 'pathq'
  | 'src'
  | 'fe_name'
  | 'be_name'
  | 'srv_name'
  | 'txn_sess_term_state';

export type IntegerFetch = 'txn_status';

/** Sample fetches evaluated against the current transaction. */
export interface SampleFetches {
  /** Throws {@link HostAccessError} when the fetch yields nothing. */
  getString(name: StringFetch): string;
  getOptionalString(name: StringFetch): string | undefined;
  getOptionalInteger(name: IntegerFetch): number | undefined;
}

export interface Transaction {
  readonly f: SampleFetches;
  getVar(name: string): ScratchValue | undefined;
  setVar(name: string, value: ScratchValue): void;
  /** Request headers with lower-cased names, each carrying every value seen. */
  requestHeaders(): Iterable<readonly [name: string, values: readonly string[]]>;
}

export interface StatusLine {
  code: number;
  reason: string;
}

export interface HttpMessage {
  isResponse(): boolean;
  setHeader(name: string, value: string): void;
  /** Only meaningful on responses. */
  statusLine(): StatusLine;
}

export interface Channel {
  isResponse(): boolean;
}

export type FilterResult = 'continue';

/** One filter instance is created per stream. */
export interface HttpFilter {
  httpHeaders(txn: Transaction, msg: HttpMessage): FilterResult;
  endAnalyze(txn: Transaction, channel: Channel): FilterResult;
}

export type ActionPhase = 'http-req' | 'http-res' | 'http-after-res';

export type ActionHandler = (txn: Transaction, args: readonly string[]) => void;

export type FilterFactory = (args: string) => HttpFilter;

export interface HostCore {
  registerAction(
    name: string,
    phases: readonly ActionPhase[],
    nargs: number,
    handler: ActionHandler,
  ): void;
  registerFilter(name: string, factory: FilterFactory): void;
}
