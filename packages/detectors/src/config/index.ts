export { ConfigScanner } from './config-scanner.js';
