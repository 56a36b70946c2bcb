import { describe, it, expect } from 'vitest';
import { rankEvidence, toRelativePath } from '../ranker.js';
import { makeEvidence } from './fixtures.js';

describe('rankEvidence', () => {
  const low = makeEvidence({ confidence: 'LOW', file: '/repo/a.rb', line: 1 });
  const medium = makeEvidence({ confidence: 'MEDIUM', file: '/repo/a.rb', line: 1 });
  const highB = makeEvidence({ confidence: 'HIGH', file: '/repo/b.rb', line: 3 });
  const highA10 = makeEvidence({ confidence: 'HIGH', file: '/repo/a.rb', line: 10 });
  const highA2 = makeEvidence({ confidence: 'HIGH', file: '/repo/a.rb', line: 2 });

  it('should order by confidence, then path, then line', () => {
    const ranked = rankEvidence([low, highB, medium, highA10, highA2], { minConfidence: 'LOW' });

    expect(ranked).toEqual([highA2, highA10, highB, medium, low]);
  });

  it('should drop evidence below the minimum confidence', () => {
    const ranked = rankEvidence([low, medium, highB], { minConfidence: 'MEDIUM' });

    expect(ranked.map(e => e.confidence)).toEqual(['HIGH', 'MEDIUM']);
  });

  it('should compare paths by code point', () => {
    const upper = makeEvidence({ file: '/repo/Zeta.rb' });
    const lower = makeEvidence({ file: '/repo/alpha.rb' });

    expect(rankEvidence([lower, upper], { minConfidence: 'LOW' }).map(e => e.file)).toEqual([
      '/repo/Zeta.rb',
      '/repo/alpha.rb',
    ]);
  });

  it('should make paths relative to the root', () => {
    const ranked = rankEvidence([makeEvidence({ file: '/repo/app/models/order.rb' })], {
      minConfidence: 'LOW',
      rootDir: '/repo',
    });

    expect(ranked[0]?.file).toBe('app/models/order.rb');
  });
});

describe('toRelativePath', () => {
  it('should leave paths outside the root alone', () => {
    expect(toRelativePath('/elsewhere/x.rb', '/repo')).toBe('/elsewhere/x.rb');
  });
});
