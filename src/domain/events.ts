/**
 * Domain events recognized in the log stream.
 *
 * Each kind carries a fixed set of typed fields, resolved once at
 * classification time. Block hashes are opaque identifiers and stay strings.
 */

export interface BlockReceivedEvent {
  readonly kind: 'received';
  readonly block_hash: string;
  /** Size of the compact block message we were sent. */
  readonly size: number;
}

export interface BlockReconstructedEvent {
  readonly kind: 'reconstructed';
  readonly block_hash: string;
  readonly prefilled_count: number;
  readonly mempool_count: number;
  /** Lower bound, the log only reports "at least". */
  readonly extra_pool_count: number;
  readonly requested_count: number;
  readonly requested_bytes: number;
}

export interface BlockAnnouncedEvent {
  readonly kind: 'announced';
  readonly block_hash: string;
  readonly peer_id: number;
}

export interface BlockRequestedEvent {
  readonly kind: 'requested';
  readonly block_hash: string;
  readonly peer_id: number;
}

export interface BlockSentEvent {
  readonly kind: 'sent';
  readonly peer_id: number;
  readonly size: number;
}

export interface WindowSizeLoggedEvent {
  readonly kind: 'window_size_logged';
  readonly max_bytes: number;
}

export type EventPayload =
  | BlockReceivedEvent
  | BlockReconstructedEvent
  | BlockAnnouncedEvent
  | BlockRequestedEvent
  | BlockSentEvent
  | WindowSizeLoggedEvent;

export type EventKind = EventPayload['kind'];

/** An event payload stamped with the timestamp of the line it came from. */
export type ClassifiedEvent = EventPayload & { readonly timestamp: string };
