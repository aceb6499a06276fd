export {
  exportCsv,
  writeReceivedCsv,
  writeSentCsv,
  toCsv,
  formatCell,
  RECEIVED_COLUMNS,
  SENT_COLUMNS,
} from './csv-writer.js';
export type { ExportPaths } from './csv-writer.js';
