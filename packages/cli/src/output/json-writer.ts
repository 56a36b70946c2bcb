/**
 * JSON Writer
 */

import { REFERENCE_KIND_DESCRIPTIONS, type Evidence } from 'tabletrace-core';
import type { ScanStats } from '../services/scan-runner.js';

export interface JsonResult extends Evidence {
  description: string;
}

export interface JsonReport {
  results: JsonResult[];
  stats: ScanStats;
}

export function toJsonReport(evidence: readonly Evidence[], stats: ScanStats): JsonReport {
  return {
    results: evidence.map(item => ({ ...item, description: REFERENCE_KIND_DESCRIPTIONS[item.kind] })),
    stats,
  };
}

export function formatJson(evidence: readonly Evidence[], stats: ScanStats): string {
  return `${JSON.stringify(toJsonReport(evidence, stats), null, 2)}\n`;
}
