export { scanRequestSchema, parseScanRequest, resolveForeignKey } from './scan-config.js';
export type { ScanRequest, ScanConfig } from './scan-config.js';
