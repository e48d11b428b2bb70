import type { Chain } from "viem";
import type { BatchCall, BatchResults, BatchValues, ValidateBatch } from "./batch.js";
import type { Method } from "./method.js";
import type { IdStore } from "./rpc.js";
import type { RequestFn, Transport, TransportConfig } from "./transports.js";

export type CallFn = <params, result>(
  method: Method<params, result>,
  params: NoInfer<params>,
) => Promise<result>;

export type NotifyFn = <params>(
  method: Method<params, unknown>,
  params: NoInfer<params>,
) => Promise<void>;

export type BatchFn = <const calls extends readonly BatchCall[]>(
  calls: calls & ValidateBatch<calls>,
) => Promise<BatchValues<calls>>;

export type TryBatchFn = <const calls extends readonly BatchCall[]>(
  calls: calls & ValidateBatch<calls>,
) => Promise<BatchResults<calls>>;

/**
 * Anything that can execute a typed single call. Both the plain and the
 * buffered clients satisfy it, so actions work with either.
 */
export type CallClient = {
  call: CallFn;
};

/**
 * Client configuration options.
 */
export type ClientConfig<
  transport extends Transport = Transport,
  chain extends Chain | undefined = Chain | undefined,
> = {
  /** The chain to connect to. */
  chain?: chain | undefined;
  /** The name of the client. */
  name?: string | undefined;
  /** The RPC transport */
  transport: transport;
  /** The id store used to allocate request ids. Defaults to a fresh one. */
  ids?: IdStore | undefined;
};

export type Client<chain extends Chain | undefined = Chain | undefined> = {
  chain: chain | undefined;
  name: string;
  transport: TransportConfig;
  uid: string;
  /** The raw transport round trip. */
  request: RequestFn;
  call: CallFn;
  notify: NotifyFn;
  /** Executes a batch, throwing the first per-call error. */
  batch: BatchFn;
  /** Executes a batch, returning every per-call outcome. */
  tryBatch: TryBatchFn;
};

export type BufferedBatchOptions = {
  /**
   * The maximum amount of concurrent round trips to send to the node.
   * Unbounded when unset.
   */
  maxConcurrentRequests?: number | undefined;
  /** The maximum number of calls per round trip. Default: 20 */
  maxSize?: number | undefined;
  /**
   * Additional time (in ms) to keep collecting calls, counted from the first
   * call of a chunk. Default: 0
   */
  delay?: number | undefined;
};

export type BufferedClientConfig<
  transport extends Transport = Transport,
  chain extends Chain | undefined = Chain | undefined,
> = ClientConfig<transport, chain> & {
  /** The coalescing configuration. */
  batch?: BufferedBatchOptions | undefined;
  /** Whether to log chunk formation and dispatch. */
  logs?: boolean | undefined;
};

export type BufferedClient<chain extends Chain | undefined = Chain | undefined> = {
  chain: chain | undefined;
  name: string;
  transport: TransportConfig;
  uid: string;
  call: CallFn;
  /** Whether the client stopped accepting calls. */
  readonly closed: boolean;
  /**
   * Stops accepting calls, drains every queued call and resolves once the
   * background worker ended.
   */
  close(): Promise<void>;
};
