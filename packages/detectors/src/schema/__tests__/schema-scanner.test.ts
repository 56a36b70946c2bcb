/**
 * Tests for the Schema Scanner
 */

import { describe, it, expect } from 'vitest';
import { SchemaScanner } from '../schema-scanner.js';
import { sourceFile } from '../../__tests__/fixtures.js';

const SCHEMA = sourceFile('/repo/db/schema.rb', [
  'ActiveRecord::Schema.define do',
  '  t.bigint "reward_id"',
  '  create_table "orders", force: :cascade do |t|',
  '    t.bigint "reward_id", null: false',
  '    t.references :reward, foreign_key: true',
  '    t.integer "reward"',
  '    t.string "reward_code"',
  '  end',
  '  create_table "payouts" do |t|',
  '    t.references :reward_tier',
  '  end',
  'end',
]);

describe('SchemaScanner', () => {
  it('should report foreign key columns and references', () => {
    const scanner = new SchemaScanner({ tableName: 'rewards' });

    const evidence = scanner.scanFile(SCHEMA);

    expect(evidence.map(e => [e.line, e.table, e.column, e.kind, e.confidence])).toEqual([
      [2, 'unknown', 'reward_id', 'schema_column', 'HIGH'],
      [4, 'orders', 'reward_id', 'schema_column', 'HIGH'],
      [5, 'orders', 'reward_id', 'schema_reference', 'HIGH'],
      [6, 'orders', 'reward_id', 'schema_column', 'HIGH'],
    ]);
  });

  it('should keep the source line as the snippet', () => {
    const scanner = new SchemaScanner({ tableName: 'rewards' });

    const evidence = scanner.scanFile(SCHEMA);

    expect(evidence[1]?.snippet).toBe('t.bigint "reward_id", null: false');
    expect(evidence[1]?.file).toBe('/repo/db/schema.rb');
  });

  it('should map a bare singular column to the foreign key override', () => {
    const scanner = new SchemaScanner({ tableName: 'rewards', foreignKey: 'prize_id' });

    const evidence = scanner.scanFile(SCHEMA);

    expect(evidence.find(e => e.line === 6)?.column).toBe('prize_id');
    expect(evidence.find(e => e.line === 5)?.column).toBe('prize_id');
  });

  it('should not match longer association names', () => {
    const scanner = new SchemaScanner({ tableName: 'rewards' });

    const evidence = scanner.scanFile(SCHEMA);

    expect(evidence.some(e => e.table === 'payouts')).toBe(false);
  });
});
