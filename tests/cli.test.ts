import { describe, it, expect, vi, afterEach } from 'vitest';
import { InvalidArgumentError } from 'commander';
import {
  buildProgram,
  parseFormat,
  parseList,
  parseTimeout,
  type CliDependencies,
} from '../api/lib/cli.js';
import { setLogLevel } from '../api/lib/logger.js';
import { DEFAULT_SUGGESTION_PROFILE } from '../api/lib/suggestions/profile.js';
import { makeRun } from './helpers.js';

// ─── Test helpers ────────────────────────────────────────────────────────────

function fakeDeps(overrides: Partial<CliDependencies> = {}) {
  const out: string[] = [];
  const err: string[] = [];
  const files = new Map<string, string>();

  const deps: CliDependencies = {
    analyze: vi.fn(async () => makeRun()),
    loadSettings: () => ({ providers: {} }),
    loadProfile: vi.fn(async () => DEFAULT_SUGGESTION_PROFILE),
    saveProfile: vi.fn(async () => true),
    readFile: async (file) => {
      const content = files.get(file);
      if (content === undefined) throw new Error(`ENOENT: ${file}`);
      return content;
    },
    writeFile: async (file, body) => {
      files.set(file, body);
    },
    isDirectory: async (file) => file === 'reports',
    stdout: (text) => {
      out.push(text);
    },
    stderr: (text) => {
      err.push(text);
    },
    ...overrides,
  };

  return { deps, out, err, files };
}

afterEach(() => {
  setLogLevel(null);
  process.exitCode = undefined;
});

// ─── Option parsers ──────────────────────────────────────────────────────────

describe('option parsers', () => {
  it('splits comma-separated lists', () => {
    expect(parseList(' a, b ,,c ')).toEqual(['a', 'b', 'c']);
  });

  it('accepts known formats case-insensitively', () => {
    expect(parseFormat('Markdown')).toBe('markdown');
    expect(() => parseFormat('pdf')).toThrow(InvalidArgumentError);
  });

  it('requires a positive integer timeout', () => {
    expect(parseTimeout('2500')).toBe(2500);
    expect(() => parseTimeout('0')).toThrow(InvalidArgumentError);
    expect(() => parseTimeout('soon')).toThrow(InvalidArgumentError);
  });
});

// ─── analyze ─────────────────────────────────────────────────────────────────

describe('analyze command', () => {
  it('passes options through and prints the report', async () => {
    const { deps, out } = fakeDeps();

    await buildProgram(deps).parseAsync(
      ['analyze', 'example.com', '-c', 'https://rival.example', '-k', 'widgets, gadgets', '--no-ai', '-f', 'markdown', '-t', '5000'],
      { from: 'user' }
    );

    expect(deps.analyze).toHaveBeenCalledWith(
      {
        url: 'example.com',
        competitors: ['https://rival.example'],
        keywords: ['widgets', 'gadgets'],
        includeCompetitive: true,
        includeKeywords: true,
        useAi: false,
        timeout: 5000,
      },
      { providers: {} }
    );
    expect(out).toHaveLength(1);
    expect(out[0].startsWith('# SEO Analysis Report\n')).toBe(true);
    expect(process.exitCode).toBeUndefined();
  });

  it('turns off competitor and keyword collection', async () => {
    const { deps } = fakeDeps();

    await buildProgram(deps).parseAsync(['analyze', 'example.com', '--no-competitive', '--no-keyword-research'], {
      from: 'user',
    });

    expect(deps.analyze).toHaveBeenCalledWith(
      expect.objectContaining({ includeCompetitive: false, includeKeywords: false, useAi: true }),
      { providers: {} }
    );
  });

  it('writes into a directory using the report filename', async () => {
    const { deps, out, files } = fakeDeps();

    await buildProgram(deps).parseAsync(['analyze', 'example.com', '--out', 'reports', '--company', 'Widgets Ltd'], {
      from: 'user',
    });

    const target = 'reports/SEO_Analysis_Report_example.com_20260304_050607.html';
    expect(files.get(target)).toContain('<p class="muted">Widgets Ltd</p>');
    expect(out).toEqual([`Report written to ${target} (score 96.9/100)\n`]);
  });

  it('reports an invalid URL without running', async () => {
    const { deps, err } = fakeDeps();

    await buildProgram(deps).parseAsync(['analyze', 'ftp://example.com'], { from: 'user' });

    expect(deps.analyze).not.toHaveBeenCalled();
    expect(err).toEqual(['Analysis failed: Invalid URL: ftp://example.com\n']);
    expect(process.exitCode).toBe(1);
  });
});

// ─── profile ─────────────────────────────────────────────────────────────────

describe('profile commands', () => {
  it('prints the active profile', async () => {
    const { deps, out } = fakeDeps();

    await buildProgram(deps).parseAsync(['profile', 'show'], { from: 'user' });

    expect(JSON.parse(out.join(''))).toEqual(DEFAULT_SUGGESTION_PROFILE);
  });

  it('validates and stores a profile file', async () => {
    const { deps, out, files } = fakeDeps();
    files.set('profile.json', JSON.stringify(DEFAULT_SUGGESTION_PROFILE));

    await buildProgram(deps).parseAsync(['profile', 'save', 'profile.json'], { from: 'user' });

    expect(deps.saveProfile).toHaveBeenCalledWith({ providers: {} }, DEFAULT_SUGGESTION_PROFILE);
    expect(out).toEqual(['Profile saved\n']);
  });

  it('refuses an invalid profile', async () => {
    const { deps, err, files } = fakeDeps();
    files.set('profile.json', '{"steps":{}}');

    await buildProgram(deps).parseAsync(['profile', 'save', 'profile.json'], { from: 'user' });

    expect(deps.saveProfile).not.toHaveBeenCalled();
    expect(err[0].startsWith('Invalid profile:\n  steps.site: Required')).toBe(true);
    expect(process.exitCode).toBe(1);
  });

  it('reports an unreadable file', async () => {
    const { deps, err } = fakeDeps();

    await buildProgram(deps).parseAsync(['profile', 'save', 'missing.json'], { from: 'user' });

    expect(err).toEqual(['Could not read missing.json: ENOENT: missing.json\n']);
  });
});
