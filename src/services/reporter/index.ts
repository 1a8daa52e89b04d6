export { StatusReporter } from './StatusReporter.js';
export type { StatusReporterConfig } from './StatusReporter.js';
export { consoleOutput, bufferedOutput } from './output.js';
export type { OutputWriter } from './output.js';
export {
  CSV_HEADER,
  STATUS_SUMMARY_TITLE,
  FINAL_SUMMARY_TITLE,
  renderCheck,
  renderPretty,
  renderJson,
  renderCsv,
  renderPrometheus,
  renderStatusTable,
  escapeCsvField,
  escapeLabelValue,
  displayMs,
  paint,
  statusCodeTone,
} from './renderers.js';
export type { RenderOptions, Tone } from './renderers.js';
