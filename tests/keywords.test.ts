import { describe, it, expect, vi } from 'vitest';
import { KEYWORD_PROVIDER_URL } from '../api/analysis.config.js';
import { baseVolumeFor, fetchKeywordMetrics, normalizeKeywords, simulateKeywordMetric } from '../api/lib/collectors/keywords.js';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

// ─── Simulation ──────────────────────────────────────────────────────────────

describe('simulateKeywordMetric', () => {
  it('gives the same figures for the same keyword', () => {
    expect(simulateKeywordMetric('coffee grinder')).toEqual(simulateKeywordMetric('coffee grinder'));
  });

  it('keeps figures inside their ranges', () => {
    for (const keyword of ['seo', 'coffee grinder', 'best burr coffee grinder']) {
      const metric = simulateKeywordMetric(keyword);
      const base = baseVolumeFor(keyword);
      expect(metric.source).toBe('simulated');
      expect(metric.searchVolume).toBeGreaterThanOrEqual(Math.max(100, base / 2));
      expect(metric.searchVolume).toBeLessThanOrEqual(base * 1.5);
      expect(metric.cpc).toBeGreaterThanOrEqual(0.25);
      expect(metric.cpc).toBeLessThanOrEqual(4.5);
      expect(metric.relatedKeywords.length).toBeGreaterThan(0);
    }
  });

  it('lowers difficulty for keywords longer than two words', () => {
    for (const keyword of ['best burr coffee grinder', 'how to brew espresso at home', 'cheap running shoes online']) {
      const { difficulty } = simulateKeywordMetric(keyword);
      expect(difficulty).toBeGreaterThanOrEqual(10);
      expect(difficulty).toBeLessThanOrEqual(70);
    }
    for (const keyword of ['espresso', 'running shoes']) {
      const { difficulty } = simulateKeywordMetric(keyword);
      expect(difficulty).toBeGreaterThanOrEqual(20);
      expect(difficulty).toBeLessThanOrEqual(90);
    }
  });

  it('bases volume on word count', () => {
    expect(baseVolumeFor('seo')).toBe(10000);
    expect(baseVolumeFor('seo tools')).toBe(5000);
    expect(baseVolumeFor('free seo tools online')).toBe(2000);
  });
});

describe('normalizeKeywords', () => {
  it('trims, drops blanks and removes duplicates in order', () => {
    expect(normalizeKeywords([' coffee ', '', 'tea', 'coffee'])).toEqual(['coffee', 'tea']);
  });
});

// ─── Provider lookups ────────────────────────────────────────────────────────

describe('fetchKeywordMetrics', () => {
  it('simulates every keyword without an API key', async () => {
    const fetchMock = vi.fn();
    vi.stubGlobal('fetch', fetchMock);

    const result = await fetchKeywordMetrics(['coffee', 'tea']);

    expect(fetchMock).not.toHaveBeenCalled();
    expect(result.errors).toEqual([]);
    expect(result.metrics).toEqual([simulateKeywordMetric('coffee'), simulateKeywordMetric('tea')]);
  });

  it('uses provider figures when the lookup succeeds', async () => {
    const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) =>
      jsonResponse({ searchVolume: 2400, difficulty: 35, cpc: 1.2, relatedKeywords: ['coffee beans'] })
    );
    vi.stubGlobal('fetch', fetchMock);

    const result = await fetchKeywordMetrics(['coffee'], { apiKey: 'test-key', timeout: 500 });

    expect(result.errors).toEqual([]);
    expect(result.metrics).toEqual([
      {
        keyword: 'coffee',
        searchVolume: 2400,
        difficulty: 35,
        cpc: 1.2,
        relatedKeywords: ['coffee beans'],
        source: 'provider',
      },
    ]);

    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe(KEYWORD_PROVIDER_URL);
    expect(init?.method).toBe('POST');
    expect(init?.body).toBe(JSON.stringify({ query: 'coffee', type: 'keyword', includeMetrics: true }));
  });

  it('marks a null provider volume unknown and fills the rest from the simulation', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => jsonResponse({ searchVolume: null })));

    const [metric] = (await fetchKeywordMetrics(['coffee'], { apiKey: 'test-key' })).metrics;
    const simulated = simulateKeywordMetric('coffee');

    expect(metric.searchVolume).toBe('unknown');
    expect(metric.source).toBe('provider');
    expect(metric.difficulty).toBe(simulated.difficulty);
    expect(metric.cpc).toBe(simulated.cpc);
    expect(metric.relatedKeywords).toEqual(simulated.relatedKeywords);
  });

  it('falls back to simulated figures per failed keyword, keeping input order', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async (_url: string, init: RequestInit) => {
        const body = typeof init.body === 'string' ? init.body : '';
        if (body.includes('"tea"')) return jsonResponse({ error: 'boom' }, 500);
        if (body.includes('"cocoa"')) return jsonResponse({ searchVolume: 'lots' });
        return jsonResponse({ searchVolume: 900 });
      })
    );

    const result = await fetchKeywordMetrics(['coffee', 'tea', 'cocoa'], { apiKey: 'test-key' });

    expect(result.metrics.map((m) => [m.keyword, m.source])).toEqual([
      ['coffee', 'provider'],
      ['tea', 'simulated'],
      ['cocoa', 'simulated'],
    ]);
    expect(result.metrics[1]).toEqual(simulateKeywordMetric('tea'));
    expect(result.errors).toEqual([
      { keyword: 'tea', message: `HTTP 500 from ${KEYWORD_PROVIDER_URL}` },
      { keyword: 'cocoa', message: 'Unexpected keyword provider response' },
    ]);
  });

  it('reports network failures', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => Promise.reject(new TypeError('fetch failed'))));

    const result = await fetchKeywordMetrics(['coffee'], { apiKey: 'test-key' });

    expect(result.metrics[0].source).toBe('simulated');
    expect(result.errors).toEqual([{ keyword: 'coffee', message: `Network error fetching ${KEYWORD_PROVIDER_URL}` }]);
  });
});
