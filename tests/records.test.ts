import { describe, it, expect } from 'vitest';
import { AnalysisError } from '../api/lib/errors.js';
import { createErrorMetricsRecord, createInsight, createKeywordMetric, createMetricsRecord } from '../api/lib/records.js';
import type { Insight } from '../api/lib/types.js';

describe('createMetricsRecord', () => {
  it('fills defaults for every missing field', () => {
    const record = createMetricsRecord({ url: 'https://example.com/' });
    expect(record.statusCode).toBe(0);
    expect(record.loadTime).toBe(0);
    expect(record.title).toBeNull();
    expect(record.headings).toEqual({ h1: 0, h2: 0, h3: 0, h4: 0, h5: 0, h6: 0 });
    expect(record.mobileFriendly).toBe(false);
    expect(record.error).toBeUndefined();
  });

  it('clamps negative and non-finite numbers to zero', () => {
    const record = createMetricsRecord({ url: 'https://example.com/', loadTime: -1, wordCount: Number.NaN });
    expect(record.loadTime).toBe(0);
    expect(record.wordCount).toBe(0);
  });

  it('returns a frozen record', () => {
    const record = createMetricsRecord({ url: 'https://example.com/' });
    expect(Object.isFrozen(record)).toBe(true);
    expect(Object.isFrozen(record.headings)).toBe(true);
  });

  it('builds an error record with safe defaults', () => {
    const record = createErrorMetricsRecord('https://down.example/', 'HTTP 503 from https://down.example/');
    expect(record.error).toBe('HTTP 503 from https://down.example/');
    expect(record.wordCount).toBe(0);
    expect(record.hasSsl).toBe(false);
  });
});

describe('createKeywordMetric', () => {
  it('keeps numeric volumes and rounds them', () => {
    expect(createKeywordMetric({ keyword: 'widgets', searchVolume: 1234.6 }).searchVolume).toBe(1235);
  });

  it('marks a missing volume as unknown', () => {
    expect(createKeywordMetric({ keyword: 'widgets' }).searchVolume).toBe('unknown');
  });

  it('caps difficulty at 100', () => {
    expect(createKeywordMetric({ keyword: 'widgets', difficulty: 140 }).difficulty).toBe(100);
  });
});

describe('createInsight', () => {
  const valid: Insight = {
    category: 'Technical SEO',
    priority: 'High',
    issue: 'Slow page',
    recommendation: 'Make it faster',
    impactScore: 8,
    effort: 'Medium',
    confidence: 0.9,
  };

  it('accepts a valid insight', () => {
    expect(createInsight(valid)).toEqual(valid);
  });

  it('rejects an impact score outside 0-10', () => {
    expect(() => createInsight({ ...valid, impactScore: 11 })).toThrow(AnalysisError);
  });

  it('rejects a confidence outside 0-1', () => {
    try {
      createInsight({ ...valid, confidence: 1.5 });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(AnalysisError);
      expect(err instanceof AnalysisError && err.code).toBe('CONTRACT_VIOLATION');
    }
  });

  it('rejects a priority outside the enum', () => {
    const input: Record<string, unknown> = { ...valid, priority: 'Critical' };
    expect(() => createInsight(Object.assign({}, valid, input))).toThrow('Invalid insight');
  });
});
