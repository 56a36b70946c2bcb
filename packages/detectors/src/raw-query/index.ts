export { RawQueryScanner } from './raw-query-scanner.js';
