import type { Payment } from "./payment";
import type { ContentObject } from "./types";

export interface ContentStore {
  /**
   * Consumes up to the network cost from `payment` and advances
   * `object.expirationEpoch` by `epochs`. Must reject without consuming when
   * `payment` is insufficient.
   */
  extend(object: ContentObject, epochs: number, payment: Payment): Promise<void>;
  /** Cost of extending `object` by `epochs`; needed by `quoted_cost` funding. */
  quoteExtension?(object: ContentObject, epochs: number): Promise<bigint>;
}

export interface TimeSource {
  currentEpoch(): Promise<number>;
}

export interface HandoffMechanism<TToken = string> {
  /** One-shot: rejects for unknown or already resolved tokens. */
  resolve(token: TToken): Promise<ContentObject>;
  /** Undoes a resolution whose consuming operation failed. */
  revert(token: TToken, object: ContentObject): Promise<void>;
}

export interface RenewalCollaborators {
  contentStore: ContentStore;
  timeSource: TimeSource;
}

export type ContentObjectResolver = (reference: string) => Promise<ContentObject>;
