/**
 * Output records of the correlation pass.
 *
 * Timestamps are the raw strings from the log. A `null` time means the
 * corresponding event was never observed for this record.
 */

export interface BlockReceiveRecord {
  readonly block_hash: string;
  readonly time_received: string;
  readonly time_reconstructed: string | null;
  readonly received_size: number;
  readonly bytes_missing: number;
  readonly tx_missing_count: number;
}

/**
 * One transmission of a compact block to one peer.
 *
 * `block_hash` refers back to the receive collection, the receive data is
 * never copied in.
 */
export interface BlockSendRecord {
  readonly block_hash: string;
  readonly peer_id: number;
  readonly time_sent: string | null;
  readonly send_size: number;
  readonly tcp_window_size: number;
}

/** Finalized collections handed to reporting and export. */
export interface CorrelationResult {
  readonly received: ReadonlyMap<string, BlockReceiveRecord>;
  readonly sent: ReadonlyMap<string, readonly BlockSendRecord[]>;
}

/** Events the engine dropped or discarded, for diagnostics only. */
export interface CorrelationCounters {
  readonly orphaned_receives: number;
  readonly unexpected_reconstructions: number;
  readonly unattributed_announces: number;
  readonly unattributed_sends: number;
  readonly unattributed_window_sizes: number;
  readonly superseded_sends: number;
}
