import type {
  BlockReceiveRecord,
  BlockSendRecord,
  ClassifiedEvent,
  CorrelationCounters,
  CorrelationResult,
} from '../domain/index.js';
import { PeerMismatchError } from '../domain/index.js';

/** Minimal logger interface accepted by the engine and the pipeline. */
export type CorrelationLog = {
  debug: (obj: Record<string, unknown>, msg: string) => void;
  warn: (obj: Record<string, unknown>, msg: string) => void;
};

type Mutable<T> = { -readonly [K in keyof T]: T[K] };

type ReceiveEntry = Mutable<BlockReceiveRecord>;
type SendEntry = Mutable<BlockSendRecord>;

/**
 * Everything the fold mutates, in one place.
 *
 * - `pendingReconstruction`: hash received but not yet reconstructed.
 * - `pendingSend`: announced/requested transmission awaiting its "sending" line.
 * - `pendingWindow`: sent transmission awaiting its "Max send per-rtt" line.
 */
export interface CorrelationState {
  readonly received: Map<string, ReceiveEntry>;
  readonly sent: Map<string, SendEntry[]>;
  pendingReconstruction: string | null;
  pendingSend: SendEntry | null;
  pendingWindow: SendEntry | null;
}

export function createCorrelationState(): CorrelationState {
  return {
    received: new Map(),
    sent: new Map(),
    pendingReconstruction: null,
    pendingSend: null,
    pendingWindow: null,
  };
}

/**
 * Single-pass correlation of classified events into receive and send records.
 *
 * Assumes the node logs one transmission as announce-or-request → sent →
 * window size, with nothing from another transmission in between. Lines for
 * different blocks may interleave freely otherwise; per-hash state is kept
 * in the maps and only the three pending slots are global.
 *
 * Feed events in log order with `apply()`, then call `result()`.
 */
export class CorrelationEngine {
  private readonly state: CorrelationState = createCorrelationState();
  private readonly log: CorrelationLog | undefined;
  private readonly counters: Mutable<CorrelationCounters> = {
    orphaned_receives: 0,
    unexpected_reconstructions: 0,
    unattributed_announces: 0,
    unattributed_sends: 0,
    unattributed_window_sizes: 0,
    superseded_sends: 0,
  };

  constructor(log?: CorrelationLog) {
    this.log = log;
  }

  apply(event: ClassifiedEvent): void {
    switch (event.kind) {
      case 'received':
        this.onReceived(event.block_hash, event.size, event.timestamp);
        return;
      case 'reconstructed':
        this.onReconstructed(event.block_hash, event.requested_count, event.requested_bytes, event.timestamp);
        return;
      // Announcing to a high-bandwidth peer and answering a getdata both end in the same send.
      case 'announced':
      case 'requested':
        this.onSendIntent(event.block_hash, event.peer_id);
        return;
      case 'sent':
        this.onSent(event.peer_id, event.size, event.timestamp);
        return;
      case 'window_size_logged':
        this.onWindowSize(event.max_bytes);
        return;
    }
  }

  private onReceived(hash: string, size: number, timestamp: string): void {
    const state = this.state;
    const orphan = state.pendingReconstruction;

    // A second receive without a reconstruction in between: the earlier block
    // was abandoned (full block arrived instead, or it was superseded).
    if (orphan !== null && orphan !== hash) {
      state.received.delete(orphan);
      this.counters.orphaned_receives++;
      this.log?.debug({ block_hash: orphan, superseded_by: hash }, 'Discarded receive that was never reconstructed');
    }

    state.received.set(hash, {
      block_hash: hash,
      time_received: timestamp,
      time_reconstructed: null,
      received_size: size,
      bytes_missing: 0,
      tx_missing_count: 0,
    });
    state.pendingReconstruction = hash;
  }

  private onReconstructed(hash: string, requestedCount: number, requestedBytes: number, timestamp: string): void {
    const state = this.state;
    const record = state.received.get(hash);

    if (state.pendingReconstruction !== hash || record === undefined) {
      this.counters.unexpected_reconstructions++;
      this.log?.warn(
        { block_hash: hash, pending: state.pendingReconstruction, timestamp },
        'Reconstruction of a block that was not pending, skipping',
      );
      return;
    }

    record.tx_missing_count = requestedCount;
    record.bytes_missing = requestedBytes;
    record.time_reconstructed = timestamp;
    state.pendingReconstruction = null;
  }

  private onSendIntent(hash: string, peerId: number): void {
    const state = this.state;

    // Full blocks we relayed never produced a receive line; nothing to attach to.
    if (!state.received.has(hash)) {
      this.counters.unattributed_announces++;
      return;
    }

    if (state.pendingSend !== null) {
      this.counters.superseded_sends++;
    }

    const entry: SendEntry = {
      block_hash: hash,
      peer_id: peerId,
      time_sent: null,
      send_size: 0,
      tcp_window_size: 0,
    };
    const list = state.sent.get(hash) ?? [];
    list.push(entry);
    state.sent.set(hash, list);
    state.pendingSend = entry;
  }

  private onSent(peerId: number, size: number, timestamp: string): void {
    const state = this.state;
    const pending = state.pendingSend;

    if (pending === null) {
      this.counters.unattributed_sends++;
      return;
    }

    if (pending.peer_id !== peerId) {
      this.discardSend(pending);
      state.pendingSend = null;
      throw new PeerMismatchError(pending.block_hash, pending.peer_id, peerId, timestamp);
    }

    pending.send_size = size;
    pending.time_sent = timestamp;
    state.pendingWindow = pending;
    state.pendingSend = null;
  }

  private discardSend(entry: SendEntry): void {
    const list = this.state.sent.get(entry.block_hash);
    if (list === undefined) return;
    const remaining = list.filter((s) => s !== entry);
    if (remaining.length === 0) {
      this.state.sent.delete(entry.block_hash);
    } else {
      this.state.sent.set(entry.block_hash, remaining);
    }
  }

  private onWindowSize(maxBytes: number): void {
    const state = this.state;
    const pending = state.pendingWindow;

    if (pending === null) {
      this.counters.unattributed_window_sizes++;
      return;
    }

    pending.tcp_window_size = maxBytes;
    state.pendingWindow = null;
  }

  /** Frozen copy of the committed records. Pending slots are not included. */
  result(): CorrelationResult {
    const received = new Map<string, BlockReceiveRecord>();
    for (const [hash, record] of this.state.received) {
      received.set(hash, Object.freeze({ ...record }));
    }

    const sent = new Map<string, readonly BlockSendRecord[]>();
    for (const [hash, records] of this.state.sent) {
      sent.set(hash, Object.freeze(records.map((r) => Object.freeze({ ...r }))));
    }

    return { received, sent };
  }

  stats(): CorrelationCounters {
    return { ...this.counters };
  }
}

/** Folds a complete list of events. */
export function correlateEvents(events: Iterable<ClassifiedEvent>, log?: CorrelationLog): CorrelationResult {
  const engine = new CorrelationEngine(log);
  for (const event of events) {
    engine.apply(event);
  }
  return engine.result();
}
