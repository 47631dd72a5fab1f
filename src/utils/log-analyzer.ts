import fs from 'fs';
import readline from 'readline';
import { Readable } from 'stream';
import {
  AnalysisReport,
  LevelCounts,
  LOG_LEVELS,
  LogLevel,
  LogRecord,
  SourceReadError,
  TagCount,
} from '../types';
import { describeError } from './error';
import { formatJson, formatTable, humanTimestamp } from './format';

export const TOP_TAGS_LIMIT = 10;

// Only date, time and pid fields may precede `L/Tag`
const LOG_LINE_PATTERN = /^(?:[\d:.-]+\s+)*([VDIWEF])\/([^\s():]+)/;
const FATAL_PATTERN = /FATAL EXCEPTION|ANR in|java\.lang\./i;

function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * Parse one logcat line into a record. Lines that do not carry a
 * `L/Tag` prefix come back with only `raw` set.
 */
export function parseLogLine(line: string): LogRecord {
  const match = LOG_LINE_PATTERN.exec(line);
  const level = match?.[1];

  if (!match || !level || !isLogLevel(level)) {
    return { raw: line };
  }

  return { raw: line, level, tag: match[2] };
}

export function isFatalLine(line: string): boolean {
  return FATAL_PATTERN.test(line);
}

export function emptyLevelCounts(): LevelCounts {
  return { V: 0, D: 0, I: 0, W: 0, E: 0, F: 0 };
}

/**
 * Order tags by descending count. Array#sort is stable, so tags with equal
 * counts keep the order in which they were first seen.
 */
export function rankTags(tags: Map<string, number>, limit = TOP_TAGS_LIMIT): TagCount[] {
  return Array.from(tags, ([tag, count]) => ({ tag, count }))
    .sort((a, b) => b.count - a.count)
    .slice(0, limit);
}

export class LogStatistics {
  private total = 0;
  private matched = 0;
  private fatalCount = 0;
  private readonly levels = emptyLevelCounts();
  private readonly tags = new Map<string, number>();

  addLine(line: string): void {
    this.add(parseLogLine(line));
  }

  add(record: LogRecord): void {
    this.total += 1;

    if (record.level && record.tag) {
      this.matched += 1;
      this.levels[record.level] += 1;
      this.tags.set(record.tag, (this.tags.get(record.tag) ?? 0) + 1);
    }

    if (isFatalLine(record.raw)) {
      this.fatalCount += 1;
    }
  }

  get lines(): number {
    return this.total;
  }

  get matchedLines(): number {
    return this.matched;
  }

  get unmatchedLines(): number {
    return this.total - this.matched;
  }

  toReport(source: string, analyzedAt: Date = new Date()): AnalysisReport {
    return Object.freeze({
      source,
      analyzedAt: humanTimestamp(analyzedAt),
      lines: this.total,
      levels: Object.freeze({ ...this.levels }),
      fatals: this.fatalCount,
      topTags: Object.freeze(rankTags(this.tags)),
    });
  }
}

export function analyzeLines(
  lines: Iterable<string>,
  source: string,
  analyzedAt?: Date
): AnalysisReport {
  const stats = new LogStatistics();
  for (const line of lines) {
    stats.addLine(line);
  }
  return stats.toReport(source, analyzedAt);
}

// Consume a readable text stream line by line; a stream error aborts the whole analysis
export function analyzeLogStream(
  input: Readable,
  source: string,
  analyzedAt?: Date
): Promise<AnalysisReport> {
  return new Promise((resolve, reject) => {
    const stats = new LogStatistics();
    const rl = readline.createInterface({ input, crlfDelay: Infinity });
    let failed = false;

    const fail = (error: unknown) => {
      if (failed) return;
      failed = true;
      rl.close();
      input.destroy();
      reject(new SourceReadError(source, describeError(error)));
    };

    input.once('error', fail);
    rl.once('error', fail);
    rl.on('line', line => stats.addLine(line));
    rl.once('close', () => {
      if (!failed) {
        resolve(stats.toReport(source, analyzedAt));
      }
    });
  });
}

export function analyzeLogFile(filePath: string, analyzedAt?: Date): Promise<AnalysisReport> {
  // Invalid UTF-8 sequences decode to U+FFFD instead of failing
  const input = fs.createReadStream(filePath, { encoding: 'utf-8' });
  return analyzeLogStream(input, filePath, analyzedAt);
}

// Machine-readable form
export function reportToJson(report: AnalysisReport): Record<string, unknown> {
  return {
    file: report.source,
    analyzed_at: report.analyzedAt,
    lines: report.lines,
    levels: { ...report.levels },
    fatals_or_anrs: report.fatals,
    top10_tags: report.topTags.map(entry => ({ tag: entry.tag, count: entry.count })),
  };
}

export function formatReportJson(report: AnalysisReport): string {
  return formatJson(reportToJson(report));
}

// Human-readable form
export function formatReportText(report: AnalysisReport): string {
  const levelRows = LOG_LEVELS.map(level => ({ level, count: report.levels[level] }));
  const tagRows = report.topTags.map(entry => ({ tag: entry.tag, count: entry.count }));

  return [
    `Log analysis: ${report.source}`,
    `Analyzed at: ${report.analyzedAt}`,
    `Lines: ${report.lines}`,
    `Fatal exceptions / ANRs: ${report.fatals}`,
    '',
    formatTable(levelRows),
    '',
    `Top ${TOP_TAGS_LIMIT} tags:`,
    formatTable(tagRows),
  ].join('\n');
}
