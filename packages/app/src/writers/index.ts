export { renderCsv } from './csv-writer.js';
export type { CsvOptions } from './csv-writer.js';
export { renderJson } from './json-writer.js';
export {
  OUTPUT_COLUMNS,
  formatTimestamp,
  roundNumber,
  toOutputRecord,
} from './format.js';
export type { OutputRecord, RenderOptions, TimestampFormat } from './format.js';
export { dayFilePath, defaultOutputPath, defaultSplitRoot, safeTickerName } from './output-path.js';
export type { OutputFormat } from './output-path.js';
export { writeFileAtomic } from './atomic-write.js';
