import { z } from 'zod';
import type { EventKind, EventPayload } from '../domain/index.js';
import { EventFieldError } from '../domain/index.js';

export type Groups = Readonly<Record<string, string | undefined>>;

/**
 * One recognized log line shape.
 *
 * `pattern` is matched against the body from its first character and must
 * use named groups; `parse` turns the captured groups into the typed event
 * and throws `EventFieldError` when a captured number is out of range.
 */
export interface EventPattern {
  readonly kind: EventKind;
  readonly category: string;
  readonly pattern: RegExp;
  readonly parse: (groups: Groups) => EventPayload;
}

const blockHash = z.string().regex(/^[0-9a-fA-F]+$/);
// Above Number.MAX_SAFE_INTEGER values are rejected, never rounded.
const count = z.coerce.number().int().nonnegative().safe();

function decode<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, kind: EventKind, groups: Groups): T {
  const parsed = schema.safeParse(groups);
  if (!parsed.success) {
    throw new EventFieldError(kind, [...new Set(parsed.error.issues.map((i) => i.path.join('.')))]);
  }
  return parsed.data;
}

const receivedSchema = z
  .object({ blockhash: blockHash, cmpctblock_bytes: count })
  .transform((g) => ({
    kind: 'received' as const,
    block_hash: g.blockhash,
    size: g.cmpctblock_bytes,
  }));

const reconstructedSchema = z
  .object({
    blockhash: blockHash,
    prefill_count: count,
    mempool_count: count,
    extrapool_count: count,
    requested_count: count,
    requested_bytes: count,
  })
  .transform((g) => ({
    kind: 'reconstructed' as const,
    block_hash: g.blockhash,
    prefilled_count: g.prefill_count,
    mempool_count: g.mempool_count,
    extra_pool_count: g.extrapool_count,
    requested_count: g.requested_count,
    requested_bytes: g.requested_bytes,
  }));

const announcedSchema = z
  .object({ blockhash: blockHash, peer_id: count })
  .transform((g) => ({ kind: 'announced' as const, block_hash: g.blockhash, peer_id: g.peer_id }));

const requestedSchema = z
  .object({ blockhash: blockHash, peer_id: count })
  .transform((g) => ({ kind: 'requested' as const, block_hash: g.blockhash, peer_id: g.peer_id }));

const sentSchema = z
  .object({ cmpctblock_bytes: count, peer_id: count })
  .transform((g) => ({ kind: 'sent' as const, peer_id: g.peer_id, size: g.cmpctblock_bytes }));

const windowSizeSchema = z
  .object({ max_send_bytes: count })
  .transform((g) => ({ kind: 'window_size_logged' as const, max_bytes: g.max_send_bytes }));

/**
 * Compact block relay lines, grouped so that receive-side lines live under
 * "cmpctblock" and send-side lines under "net". Order within a category is
 * the match order.
 */
export const DEFAULT_EVENT_PATTERNS: readonly EventPattern[] = [
  {
    kind: 'reconstructed',
    category: 'cmpctblock',
    // Successfully reconstructed block 00..76 with 1 txn prefilled, 4105 txn from mempool (incl at least 0 from extra pool) and 0 txn (0 bytes) requested
    pattern:
      /^Successfully reconstructed block (?<blockhash>[0-9a-fA-F]+) with (?<prefill_count>\d+) txn prefilled, (?<mempool_count>\d+) txn from mempool \(incl at least (?<extrapool_count>\d+) from extra pool\) and (?<requested_count>\d+) txn \((?<requested_bytes>\d+) bytes\) requested/,
    parse: (groups) => decode(reconstructedSchema, 'reconstructed', groups),
  },
  {
    kind: 'received',
    category: 'cmpctblock',
    // Initialized PartiallyDownloadedBlock for block 00..2b using a cmpctblock of 14691 bytes
    pattern:
      /^Initialized PartiallyDownloadedBlock for block (?<blockhash>[0-9a-fA-F]+) using a cmpctblock of (?<cmpctblock_bytes>\d+) bytes/,
    parse: (groups) => decode(receivedSchema, 'received', groups),
  },
  {
    kind: 'sent',
    category: 'net',
    // sending cmpctblock (25101 bytes) peer=1
    pattern: /^sending cmpctblock \((?<cmpctblock_bytes>\d+) bytes\) peer=(?<peer_id>\d+)/,
    parse: (groups) => decode(sentSchema, 'sent', groups),
  },
  {
    kind: 'announced',
    category: 'net',
    // PeerManager::NewPoWValidBlock sending header-and-ids 00..2b to peer=11
    pattern:
      /^PeerManager::NewPoWValidBlock sending header-and-ids (?<blockhash>[0-9a-fA-F]+) to peer=(?<peer_id>\d+)/,
    parse: (groups) => decode(announcedSchema, 'announced', groups),
  },
  {
    kind: 'requested',
    category: 'net',
    // received getdata for: cmpctblock 00..50 peer=3
    pattern: /^received getdata for: cmpctblock (?<blockhash>[0-9a-fA-F]+) peer=(?<peer_id>\d+)/,
    parse: (groups) => decode(requestedSchema, 'requested', groups),
  },
  {
    kind: 'window_size_logged',
    category: 'net',
    //     - Max send per-rtt: 14480 bytes
    pattern: /^\s*- Max send per-rtt: (?<max_send_bytes>\d+) bytes/,
    parse: (groups) => decode(windowSizeSchema, 'window_size_logged', groups),
  },
];
