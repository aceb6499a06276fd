import type { BlockReceiveRecord, CorrelationResult } from '../domain/index.js';

/** Receive record plus columns derived from it. */
export interface ReceivedRow extends BlockReceiveRecord {
  readonly reconstruction_time_ms: number | null;
}

/** One transmission joined with the receive data of its block. */
export interface SentRow {
  readonly block_hash: string;
  readonly time_sent: string | null;
  readonly peer_id: number;
  readonly tcp_window_size: number;
  readonly received_size: number;
  readonly received_bytes_missing: number;
  readonly received_tx_missing: number;
  readonly send_size: number;
  /** Bytes we added on top of what we received, i.e. our prefilled transactions. */
  readonly prefill_size: number;
  readonly window_bytes_used: number | null;
  readonly window_bytes_available: number | null;
  readonly rtts_without_prefill: number | null;
}

export interface ReceivedStats {
  readonly total: number;
  readonly failed: number;
  readonly fail_rate: number | null;
  readonly reconstruction_rate: number | null;
  readonly avg_received_size: number | null;
  readonly avg_bytes_missing: number | null;
  readonly avg_bytes_missing_failed: number | null;
  readonly avg_reconstruction_time_ms: number | null;
}

export interface SentStats {
  readonly total: number;
  readonly avg_send_size: number | null;
  readonly avg_send_size_prefilled: number | null;
  readonly avg_send_size_not_prefilled: number | null;
  readonly prefilled: number;
  readonly prefill_rate: number | null;
  readonly avg_prefill_size: number | null;
  readonly avg_window_bytes_available: number | null;
  readonly avg_window_bytes_available_prefilled: number | null;
  readonly avg_window_bytes_used: number | null;
  readonly prefills_that_fit: number;
  readonly prefill_fit_rate: number | null;
  readonly over_one_rtt: number;
  readonly over_one_rtt_rate: number | null;
  readonly avg_window_bytes_available_over_one_rtt: number | null;
  readonly over_one_rtt_prefills_that_fit: number;
}

export interface WindowStats {
  readonly samples: number;
  readonly avg: number | null;
  readonly median: number | null;
  readonly mode: number | null;
  readonly mode_count: number;
  /** `mode_count / samples`. */
  readonly mode_share: number | null;
}

export interface CompactBlockReport {
  readonly received: ReceivedStats;
  readonly sent: SentStats;
  readonly window: WindowStats;
}

const LOG_TIMESTAMP = /^(\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2})(?:\.(\d+))?(Z|[+-]\d{2}:?\d{2})?$/;

/**
 * Parses a log timestamp to microseconds since the epoch.
 *
 * Date only keeps milliseconds, so the fractional part is added separately.
 * A missing zone is taken as UTC. Returns `null` for anything else.
 */
export function timestampToMicros(timestamp: string): number | null {
  const match = LOG_TIMESTAMP.exec(timestamp);
  if (match === null) return null;

  const base = match[1] ?? '';
  const zone = (match[3] ?? 'Z').replace(/^([+-]\d{2})(\d{2})$/, '$1:$2');
  const seconds = Date.parse(`${base}${zone}`);
  if (Number.isNaN(seconds)) return null;

  const fraction = (match[2] ?? '').padEnd(6, '0').slice(0, 6);
  return seconds * 1000 + Number(fraction);
}

function mean(values: readonly number[]): number | null {
  if (values.length === 0) return null;
  let sum = 0;
  for (const v of values) sum += v;
  return sum / values.length;
}

function ratio(part: number, whole: number): number | null {
  return whole === 0 ? null : part / whole;
}

function nonNull(values: ReadonlyArray<number | null>): number[] {
  return values.filter((v): v is number => v !== null);
}

export function deriveReceivedRows(result: CorrelationResult): ReceivedRow[] {
  const rows: ReceivedRow[] = [];
  for (const record of result.received.values()) {
    const received = timestampToMicros(record.time_received);
    const reconstructed = record.time_reconstructed === null ? null : timestampToMicros(record.time_reconstructed);
    rows.push({
      ...record,
      reconstruction_time_ms:
        received === null || reconstructed === null ? null : (reconstructed - received) / 1000,
    });
  }
  return rows;
}

/**
 * Joins every send record with its block's receive record.
 *
 * Sends whose block has no receive record (discarded as orphaned after the
 * send was announced) are left out.
 */
export function deriveSentRows(result: CorrelationResult): SentRow[] {
  const rows: SentRow[] = [];
  for (const [hash, sends] of result.sent) {
    const received = result.received.get(hash);
    if (received === undefined) continue;

    for (const send of sends) {
      const window = send.tcp_window_size;
      const used = window > 0 ? received.received_size % window : null;
      rows.push({
        block_hash: hash,
        time_sent: send.time_sent,
        peer_id: send.peer_id,
        tcp_window_size: window,
        received_size: received.received_size,
        received_bytes_missing: received.bytes_missing,
        received_tx_missing: received.tx_missing_count,
        send_size: send.send_size,
        prefill_size: send.send_size - received.received_size,
        window_bytes_used: used,
        window_bytes_available: used === null ? null : window - used,
        rtts_without_prefill: window > 0 ? Math.floor(received.received_size / window) : null,
      });
    }
  }
  return rows;
}

export function computeReceivedStats(rows: readonly ReceivedRow[]): ReceivedStats {
  const failed = rows.filter((r) => r.tx_missing_count > 0);
  const failRate = ratio(failed.length, rows.length);

  return {
    total: rows.length,
    failed: failed.length,
    fail_rate: failRate,
    reconstruction_rate: failRate === null ? null : 1 - failRate,
    avg_received_size: mean(rows.map((r) => r.received_size)),
    avg_bytes_missing: mean(rows.map((r) => r.bytes_missing)),
    avg_bytes_missing_failed: mean(failed.map((r) => r.bytes_missing)),
    avg_reconstruction_time_ms: mean(nonNull(rows.map((r) => r.reconstruction_time_ms))),
  };
}

function fitsWindow(row: SentRow): boolean {
  return row.window_bytes_available !== null && row.prefill_size <= row.window_bytes_available;
}

export function computeSentStats(rows: readonly SentRow[]): SentStats {
  const prefilled = rows.filter((r) => r.prefill_size > 0);
  const notPrefilled = rows.filter((r) => r.prefill_size === 0);
  const fit = prefilled.filter(fitsWindow);
  // Already more than one window's worth before any prefill was added.
  const overOneRtt = rows.filter((r) => r.rtts_without_prefill !== null && r.rtts_without_prefill > 1);

  return {
    total: rows.length,
    avg_send_size: mean(rows.map((r) => r.send_size)),
    avg_send_size_prefilled: mean(prefilled.map((r) => r.send_size)),
    avg_send_size_not_prefilled: mean(notPrefilled.map((r) => r.send_size)),
    prefilled: prefilled.length,
    prefill_rate: ratio(prefilled.length, rows.length),
    avg_prefill_size: mean(prefilled.map((r) => r.prefill_size)),
    avg_window_bytes_available: mean(nonNull(rows.map((r) => r.window_bytes_available))),
    avg_window_bytes_available_prefilled: mean(nonNull(prefilled.map((r) => r.window_bytes_available))),
    avg_window_bytes_used: mean(nonNull(rows.map((r) => r.window_bytes_used))),
    prefills_that_fit: fit.length,
    prefill_fit_rate: ratio(fit.length, prefilled.length),
    over_one_rtt: overOneRtt.length,
    over_one_rtt_rate: ratio(overOneRtt.length, rows.length),
    avg_window_bytes_available_over_one_rtt: mean(nonNull(overOneRtt.map((r) => r.window_bytes_available))),
    over_one_rtt_prefills_that_fit: overOneRtt.filter(fitsWindow).length,
  };
}

/** Window size distribution over sends whose window was logged. */
export function computeWindowStats(rows: readonly SentRow[]): WindowStats {
  const sizes = rows.map((r) => r.tcp_window_size).filter((w) => w > 0).sort((a, b) => a - b);
  if (sizes.length === 0) {
    return { samples: 0, avg: null, median: null, mode: null, mode_count: 0, mode_share: null };
  }

  const mid = Math.floor(sizes.length / 2);
  const median = sizes.length % 2 === 1 ? sizes[mid] ?? null : ((sizes[mid - 1] ?? 0) + (sizes[mid] ?? 0)) / 2;

  // Ties go to the smallest value, sizes are sorted ascending.
  const counts = new Map<number, number>();
  let mode: number | null = null;
  let modeCount = 0;
  for (const size of sizes) {
    const n = (counts.get(size) ?? 0) + 1;
    counts.set(size, n);
    if (n > modeCount) {
      mode = size;
      modeCount = n;
    }
  }

  return {
    samples: sizes.length,
    avg: mean(sizes),
    median,
    mode,
    mode_count: modeCount,
    mode_share: ratio(modeCount, sizes.length),
  };
}

export function buildReport(result: CorrelationResult): CompactBlockReport {
  const sentRows = deriveSentRows(result);
  return {
    received: computeReceivedStats(deriveReceivedRows(result)),
    sent: computeSentStats(sentRows),
    window: computeWindowStats(sentRows),
  };
}

function fixed(value: number | null, unit = ''): string {
  return value === null ? 'n/a' : `${value.toFixed(2)}${unit}`;
}

function percent(value: number | null): string {
  return value === null ? 'n/a' : `${(value * 100).toFixed(2)}%`;
}

/** Human-readable summary, one statement per line. */
export function formatReport(report: CompactBlockReport): string[] {
  const { received: r, sent: s, window: w } = report;
  const lines = [
    `${r.failed} out of ${r.total} blocks received failed reconstruction. (${percent(r.fail_rate)})`,
    `Reconstruction rate was ${percent(r.reconstruction_rate)}`,
    `Avg size of received block: ${fixed(r.avg_received_size, ' bytes')}`,
    `Avg bytes missing from received blocks: ${fixed(r.avg_bytes_missing, ' bytes')}`,
    `Avg bytes missing from blocks that failed reconstruction: ${fixed(r.avg_bytes_missing_failed, ' bytes')}`,
    `Avg reconstruction time: ${fixed(r.avg_reconstruction_time_ms, 'ms')}`,
    `Avg CMPCTBLOCK sent: ${fixed(s.avg_send_size, ' bytes')}`,
    `Avg prefilled CMPCTBLOCK sent: ${fixed(s.avg_send_size_prefilled, ' bytes')}`,
    `Avg CMPCTBLOCK sent without prefill: ${fixed(s.avg_send_size_not_prefilled, ' bytes')}`,
    `${s.prefilled}/${s.total} blocks were sent with prefills. (${percent(s.prefill_rate)})`,
    `Avg available prefill bytes for all CMPCTBLOCKs sent: ${fixed(s.avg_window_bytes_available, ' bytes')}`,
  ];

  if (s.prefilled > 0) {
    lines.push(
      `Avg available prefill bytes for prefilled CMPCTBLOCKs sent: ${fixed(s.avg_window_bytes_available_prefilled, ' bytes')}`,
      `Avg total prefill size for CMPCTBLOCKs prefilled: ${fixed(s.avg_prefill_size, ' bytes')}`,
      `${s.prefills_that_fit}/${s.prefilled} prefilled blocks sent fit in the available bytes. (${percent(s.prefill_fit_rate)})`,
    );
  }

  lines.push(
    `${s.over_one_rtt}/${s.total} CMPCTBLOCKs sent were already over the window for a single RTT before prefilling. (${percent(s.over_one_rtt_rate)})`,
    `Avg available bytes for prefill in blocks already over a single RTT: ${fixed(s.avg_window_bytes_available_over_one_rtt, ' bytes')}`,
    `${s.over_one_rtt_prefills_that_fit}/${s.over_one_rtt} of those had prefills that fit.`,
    `TCP window size: avg ${fixed(w.avg, ' bytes')}, median ${w.median ?? 'n/a'}, mode ${w.mode ?? 'n/a'}`,
    `The mode represented ${w.mode_count}/${w.samples} windows. (${percent(w.mode_share)})`,
    `Avg TCP window bytes used: ${fixed(s.avg_window_bytes_used, ' bytes')}`,
  );

  return lines;
}
