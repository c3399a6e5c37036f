/**
 * Command Line Program
 *
 * `seo-insight analyze <url>` runs the pipeline and writes a report;
 * `seo-insight profile ...` reads or stores the suggestion profile.
 * Collaborators are injectable so the program can be driven in tests.
 */

import { Command, InvalidArgumentError } from 'commander';
import { readFile, stat, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { PIPELINE_VERSION } from '../analysis.config.js';
import { runAnalysis, type AnalysisRequest } from '../analyze.js';
import { loadSuggestionProfile, saveSuggestionProfile } from '../config.js';
import { getErrorMessage } from './errors.js';
import { setLogLevel } from './logger.js';
import { exportReport, REPORT_FORMATS, type ReportFormat } from './report/index.js';
import { loadSettings, type AnalysisSettings } from './settings.js';
import { SuggestionProfileSchema, type SuggestionProfile } from './suggestions/profile.js';
import type { AnalysisRun } from './types.js';
import { normalizeUrl } from './url.js';

// ============================================================================
// Option Parsers
// ============================================================================

/**
 * Comma-separated list, trimmed, blanks dropped
 */
export function parseList(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

export function isReportFormat(value: string): value is ReportFormat {
  return REPORT_FORMATS.some((format) => format === value);
}

export function parseFormat(value: string): ReportFormat {
  const format = value.trim().toLowerCase();
  if (!isReportFormat(format)) {
    throw new InvalidArgumentError(`Expected one of: ${REPORT_FORMATS.join(', ')}`);
  }
  return format;
}

export function parseTimeout(value: string): number {
  const ms = Number(value);
  if (!Number.isInteger(ms) || ms <= 0) {
    throw new InvalidArgumentError('Timeout must be a positive number of milliseconds');
  }
  return ms;
}

// ============================================================================
// Program
// ============================================================================

export interface CliDependencies {
  analyze(request: AnalysisRequest, settings: AnalysisSettings): Promise<AnalysisRun>;
  loadSettings(): AnalysisSettings;
  loadProfile(settings: AnalysisSettings): Promise<SuggestionProfile>;
  saveProfile(settings: AnalysisSettings, profile: SuggestionProfile): Promise<boolean>;
  readFile(file: string): Promise<string>;
  writeFile(file: string, body: string): Promise<void>;
  isDirectory(file: string): Promise<boolean>;
  stdout(text: string): void;
  stderr(text: string): void;
}

export const defaultCliDependencies: CliDependencies = {
  analyze: (request, settings) => runAnalysis(request, settings),
  loadSettings: () => loadSettings(),
  loadProfile: loadSuggestionProfile,
  saveProfile: saveSuggestionProfile,
  readFile: (file) => readFile(file, 'utf8'),
  writeFile: (file, body) => writeFile(file, body, 'utf8'),
  isDirectory: async (file) => {
    try {
      return (await stat(file)).isDirectory();
    } catch {
      return false;
    }
  },
  stdout: (text) => {
    process.stdout.write(text);
  },
  stderr: (text) => {
    process.stderr.write(text);
  },
};

export interface AnalyzeCliOptions {
  competitors: string[];
  keywords: string[];
  competitive: boolean;
  /** `--no-keyword-research` sets this to false */
  keywordResearch: boolean;
  ai: boolean;
  format: ReportFormat;
  out?: string;
  timeout?: number;
  company?: string;
  preparedFor?: string;
  notes?: string;
  verbose: boolean;
}

export function buildProgram(deps: CliDependencies = defaultCliDependencies): Command {
  const program = new Command();

  program
    .name('seo-insight')
    .description('Turn page, competitor and keyword measurements into a ranked SEO action plan')
    .version(PIPELINE_VERSION);

  program
    .command('analyze')
    .description('Analyze a page and write a report')
    .argument('<url>', 'Page to analyze (https:// is assumed when omitted)')
    .option('-c, --competitors <urls>', 'Comma-separated competitor URLs', parseList, [])
    .option('-k, --keywords <keywords>', 'Comma-separated target keywords', parseList, [])
    .option('--no-competitive', 'Skip the competitor comparison')
    .option('--no-keyword-research', 'Skip keyword research')
    .option('--no-ai', 'Use rule-based tips only')
    .option('-f, --format <format>', `Report format (${REPORT_FORMATS.join(', ')})`, parseFormat, 'html')
    .option('-o, --out <path>', 'Write the report to a file or directory instead of stdout')
    .option('-t, --timeout <ms>', 'Per-request timeout in milliseconds', parseTimeout)
    .option('--company <name>', 'Company name for the report header')
    .option('--prepared-for <name>', 'Client the report is prepared for')
    .option('--notes <text>', 'Free-text notes for the report header')
    .option('-v, --verbose', 'Debug logging', false)
    .action(async (url: string, options: AnalyzeCliOptions) => {
      try {
        normalizeUrl(url);
        const settings = deps.loadSettings();

        if (options.verbose) {
          setLogLevel('debug');
        } else if (!options.out) {
          // Keep stdout clean for the report body
          setLogLevel('warn');
        } else {
          setLogLevel(settings.logLevel ?? null);
        }

        const run = await deps.analyze(
          {
            url,
            competitors: options.competitors,
            keywords: options.keywords,
            includeCompetitive: options.competitive,
            includeKeywords: options.keywordResearch,
            useAi: options.ai,
            timeout: options.timeout,
          },
          settings
        );

        const report = exportReport(run, {
          format: options.format,
          branding: {
            companyName: options.company,
            preparedFor: options.preparedFor,
            notes: options.notes,
          },
        });

        if (!options.out) {
          deps.stdout(report.body);
          return;
        }

        const target = (await deps.isDirectory(options.out))
          ? path.join(options.out, report.filename)
          : options.out;
        await deps.writeFile(target, report.body);
        deps.stdout(`Report written to ${target} (score ${run.analysis.overallScore.toFixed(1)}/100)\n`);
      } catch (error) {
        deps.stderr(`Analysis failed: ${getErrorMessage(error)}\n`);
        process.exitCode = 1;
      }
    });

  const profileCmd = program.command('profile').description('Manage the stored suggestion profile');

  profileCmd
    .command('show')
    .description('Print the active suggestion profile as JSON')
    .action(async () => {
      const profile = await deps.loadProfile(deps.loadSettings());
      deps.stdout(`${JSON.stringify(profile, null, 2)}\n`);
    });

  profileCmd
    .command('save')
    .description('Validate a profile JSON file and store it')
    .argument('<file>', 'Path to the profile JSON')
    .action(async (file: string) => {
      let raw: unknown;
      try {
        raw = JSON.parse(await deps.readFile(file));
      } catch (error) {
        deps.stderr(`Could not read ${file}: ${getErrorMessage(error)}\n`);
        process.exitCode = 1;
        return;
      }

      const parsed = SuggestionProfileSchema.safeParse(raw);
      if (!parsed.success) {
        const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
        deps.stderr(`Invalid profile:\n  ${issues.join('\n  ')}\n`);
        process.exitCode = 1;
        return;
      }

      const saved = await deps.saveProfile(deps.loadSettings(), parsed.data);
      if (!saved) {
        deps.stderr('Profile not saved (is Redis configured?)\n');
        process.exitCode = 1;
        return;
      }
      deps.stdout('Profile saved\n');
    });

  return program;
}
