export { CSV_COLUMNS, escapeCsvField, formatCsv } from './csv-writer.js';
export { formatJson, toJsonReport, type JsonReport, type JsonResult } from './json-writer.js';
