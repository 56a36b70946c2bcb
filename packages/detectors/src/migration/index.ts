export { MigrationScanner } from './migration-scanner.js';
