/**
 * Tests for the Polymorphic Resolver and Scanner
 */

import { describe, it, expect } from 'vitest';
import {
  collectPolymorphicPairs,
  findConfirmedPrefixes,
  findCorroboratedPrefixes,
  resolvePolymorphicPairs,
} from '../polymorphic-resolver.js';
import { PolymorphicScanner } from '../polymorphic-scanner.js';
import { sourceFile, sourceSet } from '../../__tests__/fixtures.js';

const SCHEMA = sourceFile('/repo/db/schema.rb', [
  'ActiveRecord::Schema.define do',
  '  create_table "comments" do |t|',
  '    t.string "commentable_type"',
  '    t.bigint "commentable_id"',
  '  end',
  '  create_table "taggings" do |t|',
  '    t.string "taggable_type"',
  '    t.integer "taggable_id"',
  '  end',
  '  create_table "rewards" do |t|',
  '    t.string "owner_type"',
  '    t.bigint "owner_id"',
  '  end',
  '  create_table "attachments" do |t|',
  '    t.string "record_type"',
  '    t.bigint "record_id"',
  '  end',
  '  create_table "notes" do |t|',
  '    t.string "author_type"',
  'end',
]);

const CAMPAIGN = sourceFile('/repo/app/models/campaign.rb', [
  'class Campaign < ApplicationRecord',
  '  has_many :rewards, as: :commentable',
  'end',
]);

const TAGGER = sourceFile('/repo/app/services/tagger.rb', ['Tagging.where(taggable_type: "Reward")']);

describe('collectPolymorphicPairs', () => {
  it('should pair type and id columns per table and skip the target', () => {
    const pairs = collectPolymorphicPairs([SCHEMA], 'rewards');

    expect(pairs).toEqual([
      { table: 'comments', prefix: 'commentable', file: '/repo/db/schema.rb', line: 4, snippet: 't.bigint "commentable_id"' },
      { table: 'taggings', prefix: 'taggable', file: '/repo/db/schema.rb', line: 8, snippet: 't.integer "taggable_id"' },
      { table: 'attachments', prefix: 'record', file: '/repo/db/schema.rb', line: 16, snippet: 't.bigint "record_id"' },
    ]);
  });
});

describe('findConfirmedPrefixes', () => {
  it('should read the as: option of associations to the target', () => {
    const file = sourceFile('/repo/app/models/x.rb', [
      '  has_one :reward, as: :awardable',
      '  has_many :rewards, as: :commentable',
      '  has_many :comments, as: :commentable_thing',
    ]);

    expect([...findConfirmedPrefixes([file], 'rewards')]).toEqual(['awardable', 'commentable']);
  });
});

describe('findCorroboratedPrefixes', () => {
  it('should need the type column and the class name on one line', () => {
    const sources = sourceSet({
      source: [
        sourceFile('/repo/a.rb', ['where(record_type: "Order")', 'Reward.first', TAGGER.lines[0] ?? '']),
      ],
    });

    const found = findCorroboratedPrefixes(sources, new Set(['taggable', 'record']), 'Reward');

    expect([...found]).toEqual(['taggable']);
  });
});

describe('resolvePolymorphicPairs', () => {
  it('should keep confirmed and corroborated pairs only', () => {
    const sources = sourceSet({ schema: [SCHEMA], model: [CAMPAIGN], source: [TAGGER] });

    const resolved = resolvePolymorphicPairs(sources, 'rewards');

    expect(resolved.map(pair => [pair.table, pair.prefix, pair.resolution])).toEqual([
      ['comments', 'commentable', 'model'],
      ['taggings', 'taggable', 'corroborated'],
    ]);
  });

  it('should return nothing without schema pairs', () => {
    const sources = sourceSet({ model: [CAMPAIGN], source: [TAGGER] });

    expect(resolvePolymorphicPairs(sources, 'rewards')).toEqual([]);
  });
});

describe('PolymorphicScanner', () => {
  it('should emit evidence at the id column of the schema file', () => {
    const scanner = new PolymorphicScanner({ tableName: 'rewards' });
    const sources = sourceSet({ schema: [SCHEMA], model: [CAMPAIGN], source: [TAGGER] });

    expect(scanner.scanAll(sources)).toEqual([
      {
        file: '/repo/db/schema.rb',
        line: 4,
        table: 'comments',
        column: 'commentable_id',
        kind: 'polymorphic_model',
        snippet: 't.bigint "commentable_id"',
        confidence: 'HIGH',
        schemaVerified: true,
      },
      {
        file: '/repo/db/schema.rb',
        line: 8,
        table: 'taggings',
        column: 'taggable_id',
        kind: 'polymorphic_schema',
        snippet: 't.integer "taggable_id"',
        confidence: 'MEDIUM',
        schemaVerified: true,
      },
    ]);
  });
});
