/**
 * Tests for the File Classifier
 */

import { describe, it, expect, beforeAll, afterAll, vi } from 'vitest';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { categorizeFile, collectFiles, loadSources, splitLines } from './file-classifier.js';
import { ScanErrorCode } from '../errors/scan-error.js';
import { countFiles, createEmptyCategorizedFiles } from '../types/files.js';
import type { Logger } from '../logging/logger.js';

const FIXTURE_FILES: Record<string, string> = {
  'db/schema.rb': 'ActiveRecord::Schema.define do\nend\n',
  'db/migrate/20240101000000_add_reward_to_orders.rb': 'class AddRewardToOrders\nend\n',
  'db/seeds.rb': 'Reward.create!\n',
  'db/queries/report.sql': 'SELECT * FROM rewards;\n',
  'app/models/order.rb': 'class Order < ApplicationRecord\nend\n',
  'app/models/concerns/rewardable.rb': 'module Rewardable\nend\n',
  'app/services/payout.rb': 'class Payout\nend\n',
  'app/views/rewards/index.html.erb': '<%= @rewards.count %>\n',
  'config/settings.yml': 'rewards:\n  enabled: true\n',
  'config/database.yml': 'development:\n  database: app_dev\n',
  'vendor/bundle/gem.rb': 'class Gem\nend\n',
  'log/development.rb': 'noise\n',
  'README.md': '# App\n',
};


describe('file-classifier', () => {
  let root: string;
  const at = (relative: string) => path.join(root, relative);

  beforeAll(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'tabletrace-classifier-'));
    for (const [relative, content] of Object.entries(FIXTURE_FILES)) {
      await fs.mkdir(path.dirname(at(relative)), { recursive: true });
      await fs.writeFile(at(relative), content);
    }
  });

  afterAll(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  describe('categorizeFile', () => {
    it('should recognise the schema file only at db/schema.rb', () => {
      expect(categorizeFile('db/schema.rb')).toBe('schema');
      expect(categorizeFile('engines/billing/db/schema.rb')).toBe('source');
    });

    it('should recognise migrations and models by directory', () => {
      expect(categorizeFile('db/migrate/20240101_add_reward.rb')).toBe('migration');
      expect(categorizeFile('app/models/order.rb')).toBe('model');
      expect(categorizeFile('app/models/concerns/rewardable.rb')).toBe('model');
    });

    it('should fall back to extension rules', () => {
      expect(categorizeFile('lib/tasks/cleanup.rb')).toBe('source');
      expect(categorizeFile('db/structure.sql')).toBe('sql');
      expect(categorizeFile('app/views/orders/show.html.erb')).toBe('template');
      expect(categorizeFile('config/sidekiq.yml')).toBe('config');
      expect(categorizeFile('config/locales/en.yaml')).toBe('config');
      expect(categorizeFile('.rubocop.yml')).toBe('config');
    });

    it('should return null for files no rule covers', () => {
      expect(categorizeFile('README.md')).toBeNull();
      expect(categorizeFile('app/javascript/index.ts')).toBeNull();
    });
  });

  describe('collectFiles', () => {
    it('should group files by category in sorted walk order', async () => {
      const files = await collectFiles(root);

      expect(files.schema).toEqual([at('db/schema.rb')]);
      expect(files.migration).toEqual([at('db/migrate/20240101000000_add_reward_to_orders.rb')]);
      expect(files.model).toEqual([at('app/models/concerns/rewardable.rb'), at('app/models/order.rb')]);
      expect(files.source).toEqual([at('app/services/payout.rb'), at('db/seeds.rb')]);
      expect(files.sql).toEqual([at('db/queries/report.sql')]);
      expect(files.template).toEqual([at('app/views/rewards/index.html.erb')]);
      expect(files.config).toEqual([at('config/database.yml'), at('config/settings.yml')]);
    });

    it('should skip ignored directories', async () => {
      const files = await collectFiles(root);
      const all = Object.values(files).flat();

      expect(all).not.toContain(at('vendor/bundle/gem.rb'));
      expect(all).not.toContain(at('log/development.rb'));
    });

    it('should skip extra ignored directories', async () => {
      const files = await collectFiles(root, { ignoreDirectories: ['app'] });

      expect(files.model).toEqual([]);
      expect(files.source).toEqual([at('db/seeds.rb')]);
    });

    it('should reject a root that does not exist', async () => {
      await expect(collectFiles(at('missing'))).rejects.toMatchObject({
        code: ScanErrorCode.ROOT_NOT_FOUND,
      });
    });

    it('should reject a root that is a file', async () => {
      await expect(collectFiles(at('README.md'))).rejects.toMatchObject({
        code: ScanErrorCode.ROOT_NOT_FOUND,
      });
    });
  });

  describe('loadSources', () => {
    it('should read each file into lines', async () => {
      const files = createEmptyCategorizedFiles();
      files.sql.push(at('db/queries/report.sql'));

      const sources = await loadSources(files);

      expect(sources.sql).toEqual([
        { path: at('db/queries/report.sql'), lines: ['SELECT * FROM rewards;'] },
      ]);
    });

    it('should warn about unreadable files and keep going', async () => {
      const warn = vi.fn();
      const logger: Logger = { debug: vi.fn(), info: vi.fn(), warn, error: vi.fn() };
      const files = createEmptyCategorizedFiles();
      files.model.push(at('app/models/deleted.rb'), at('app/models/order.rb'));

      const sources = await loadSources(files, logger);

      expect(sources.model.map(s => s.path)).toEqual([at('app/models/order.rb')]);
      expect(countFiles(files)).toBe(2);
      expect(countFiles(sources)).toBe(1);
      expect(warn).toHaveBeenCalledTimes(1);
      expect(String(warn.mock.calls[0]?.[0])).toContain('deleted.rb');
    });
  });

  describe('splitLines', () => {
    it('should drop the empty line after a final newline', () => {
      expect(splitLines('a\nb\n')).toEqual(['a', 'b']);
    });

    it('should handle CRLF line endings', () => {
      expect(splitLines('a\r\nb')).toEqual(['a', 'b']);
    });

    it('should return no lines for empty content', () => {
      expect(splitLines('')).toEqual([]);
    });
  });
});
