import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { ReceivedRow, SentRow } from '../../application/reporting.js';

type Cell = string | number | null;

export const RECEIVED_COLUMNS = [
  'block_hash',
  'time_received',
  'time_reconstructed',
  'received_size',
  'bytes_missing',
  'tx_missing_count',
  'reconstruction_time_ms',
] as const satisfies readonly (keyof ReceivedRow)[];

export const SENT_COLUMNS = [
  'block_hash',
  'time_sent',
  'peer_id',
  'tcp_window_size',
  'received_size',
  'received_bytes_missing',
  'received_tx_missing',
  'send_size',
  'prefill_size',
  'window_bytes_used',
  'window_bytes_available',
  'rtts_without_prefill',
] as const satisfies readonly (keyof SentRow)[];

/** Quotes a cell when it contains a comma, a quote or a line break. */
export function formatCell(value: Cell): string {
  if (value === null) return '';
  const text = String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

/** Header row plus one row per record, LF-terminated. */
export function toCsv<T extends Record<K, Cell>, K extends string>(
  columns: readonly K[],
  rows: readonly T[],
): string {
  const lines = [columns.join(',')];
  for (const row of rows) {
    lines.push(columns.map((column) => formatCell(row[column])).join(','));
  }
  return lines.join('\n') + '\n';
}

export async function writeReceivedCsv(path: string, rows: readonly ReceivedRow[]): Promise<void> {
  await writeFile(path, toCsv(RECEIVED_COLUMNS, rows), 'utf-8');
}

export async function writeSentCsv(path: string, rows: readonly SentRow[]): Promise<void> {
  await writeFile(path, toCsv(SENT_COLUMNS, rows), 'utf-8');
}

export interface ExportPaths {
  readonly received: string;
  readonly sent: string;
}

/** Writes `received.csv` and `sent.csv` into `outputDir`, creating it if needed. */
export async function exportCsv(
  outputDir: string,
  received: readonly ReceivedRow[],
  sent: readonly SentRow[],
): Promise<ExportPaths> {
  await mkdir(outputDir, { recursive: true });
  const paths = {
    received: join(outputDir, 'received.csv'),
    sent: join(outputDir, 'sent.csv'),
  };
  await writeReceivedCsv(paths.received, received);
  await writeSentCsv(paths.sent, sent);
  return paths;
}
