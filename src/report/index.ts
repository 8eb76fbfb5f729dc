// src/report/index.ts
export type { SummaryRow } from './summary';
export { topPlayers, winRate, formatSummary, formatSummaryRow } from './summary';
export type { ExportDocument } from './export';
export { EXPORT_VERSION, toExportDocument, writeExport } from './export';
