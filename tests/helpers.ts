import { vi } from 'vitest';
import type { Mock } from 'vitest';
import type {
  BlockReceiveRecord,
  BlockSendRecord,
  ClassifiedEvent,
  CorrelationResult,
  LogVocabulary,
} from '../src/domain/index.js';
import type { CorrelationLog } from '../src/application/index.js';
import { toVocabulary } from '../src/infrastructure/index.js';

/** Small vocabulary so tests don't depend on the bundled file. */
export function makeVocabulary(): LogVocabulary {
  return toVocabulary({
    categories: ['all', 'net', 'cmpctblock', 'validation'],
    threads: ['msghand', 'net', 'shutoff'],
    numbered_thread_prefixes: ['scriptch', 'httpworker'],
  });
}

export interface SpyLog extends CorrelationLog {
  debug: Mock;
  warn: Mock;
}

/** Logger whose calls can be asserted. */
export function makeLog(): SpyLog {
  return { debug: vi.fn(), warn: vi.fn() };
}

// ── Event factories ──────────────────────────────────────

export function received(hash: string, size: number, timestamp: string): ClassifiedEvent {
  return { kind: 'received', block_hash: hash, size, timestamp };
}

export function reconstructed(
  hash: string,
  timestamp: string,
  requested: { count?: number; bytes?: number } = {},
): ClassifiedEvent {
  return {
    kind: 'reconstructed',
    block_hash: hash,
    prefilled_count: 1,
    mempool_count: 10,
    extra_pool_count: 0,
    requested_count: requested.count ?? 0,
    requested_bytes: requested.bytes ?? 0,
    timestamp,
  };
}

export function announced(hash: string, peer: number, timestamp: string): ClassifiedEvent {
  return { kind: 'announced', block_hash: hash, peer_id: peer, timestamp };
}

export function requested(hash: string, peer: number, timestamp: string): ClassifiedEvent {
  return { kind: 'requested', block_hash: hash, peer_id: peer, timestamp };
}

export function sent(peer: number, size: number, timestamp: string): ClassifiedEvent {
  return { kind: 'sent', peer_id: peer, size, timestamp };
}

export function windowSize(maxBytes: number, timestamp: string): ClassifiedEvent {
  return { kind: 'window_size_logged', max_bytes: maxBytes, timestamp };
}

// ── Record factories ─────────────────────────────────────

export function receiveRecord(overrides: Partial<BlockReceiveRecord> = {}): BlockReceiveRecord {
  return {
    block_hash: overrides.block_hash ?? 'aa',
    time_received: overrides.time_received ?? '2025-07-11T17:07:36.000000Z',
    time_reconstructed: overrides.time_reconstructed === undefined ? null : overrides.time_reconstructed,
    received_size: overrides.received_size ?? 0,
    bytes_missing: overrides.bytes_missing ?? 0,
    tx_missing_count: overrides.tx_missing_count ?? 0,
  };
}

export function sendRecord(overrides: Partial<BlockSendRecord> = {}): BlockSendRecord {
  return {
    block_hash: overrides.block_hash ?? 'aa',
    peer_id: overrides.peer_id ?? 1,
    time_sent: overrides.time_sent === undefined ? '2025-07-11T17:07:36.100000Z' : overrides.time_sent,
    send_size: overrides.send_size ?? 0,
    tcp_window_size: overrides.tcp_window_size ?? 0,
  };
}

/** Builds a result from receive records and the sends of each hash. */
export function makeResult(
  receives: readonly BlockReceiveRecord[],
  sends: readonly BlockSendRecord[] = [],
): CorrelationResult {
  const receivedMap = new Map<string, BlockReceiveRecord>();
  for (const r of receives) receivedMap.set(r.block_hash, r);

  const sentMap = new Map<string, BlockSendRecord[]>();
  for (const s of sends) {
    const list = sentMap.get(s.block_hash) ?? [];
    list.push(s);
    sentMap.set(s.block_hash, list);
  }

  return { received: receivedMap, sent: sentMap };
}
