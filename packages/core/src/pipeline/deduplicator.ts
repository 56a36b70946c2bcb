/**
 * Evidence Deduplicator
 */

import { compareConfidence, evidenceKey, type Evidence } from '../types/evidence.js';

/**
 * Collapse evidence sharing a file, line and kind. The first record seen
 * for a key is kept unless a later one is strictly more confident.
 * Output keeps first-seen key order.
 */
export function deduplicateEvidence(evidence: readonly Evidence[]): Evidence[] {
  const best = new Map<string, Evidence>();

  for (const item of evidence) {
    const key = evidenceKey(item);
    const existing = best.get(key);
    if (!existing || compareConfidence(item.confidence, existing.confidence) > 0) {
      best.set(key, item);
    }
  }

  return [...best.values()];
}
