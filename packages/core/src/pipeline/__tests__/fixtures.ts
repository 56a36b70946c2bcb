import type { Evidence } from '../../types/evidence.js';

/**
 * Evidence with sensible defaults for pipeline tests.
 */
export function makeEvidence(overrides: Partial<Evidence> = {}): Evidence {
  return {
    file: '/repo/app/models/order.rb',
    line: 1,
    table: 'orders',
    column: 'reward_id',
    kind: 'model_belongs_to',
    snippet: 'belongs_to :reward',
    confidence: 'HIGH',
    schemaVerified: true,
    ...overrides,
  };
}
