export { BaseScanner, type ScanTarget, type EvidenceFields } from './base-scanner.js';
