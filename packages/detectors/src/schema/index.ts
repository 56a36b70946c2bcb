export { SchemaScanner } from './schema-scanner.js';
