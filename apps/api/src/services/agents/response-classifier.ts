/**
 * Response Classifier
 * Every decision that depends on literal markers in model output lives here:
 * search readiness, profile update blocks, repair triggers, strategy lines,
 * filter indices and search-term extraction. Parse misses never throw; they
 * yield "nothing extracted" and callers keep their defaults.
 */

import { TIME_RANGES, type SearchStrategy, type TimeRange, type UserProfile } from '@radar/shared';

export const READY_MARKERS = ['【搜索就绪】', '【READY】'] as const;
export const UPDATE_OPEN_MARKER = '【更新】';
export const UPDATE_CLOSE_MARKER = '【/更新】';
/** "needs improvement" / "redo" */
export const REPAIR_MARKERS = ['需要改进', '返工'] as const;

const FILTER_LINE_HINTS = ['匹配', '相关', '推荐', 'match', 'relevant', 'recommend'];
const SEARCH_TERM_HINTS = ['keyword', '关键词', 'search', '搜索'];
const MAX_SEARCH_TERMS = 5;

export interface ResponseClassifier {
  isSearchReady(text: string): boolean;
  extractProfileUpdates(text: string): UserProfile;
  stripMarkers(text: string): string;
  needsRepair(reflection: string): boolean;
  parseStrategy(text: string, defaults: SearchStrategy): SearchStrategy;
  /** 0-based indices of candidates the model marked as matches */
  parseFilterIndices(text: string, candidateCount: number): number[];
  extractSearchTerms(text: string): string[];
}

function isTimeRange(value: string): value is TimeRange {
  return TIME_RANGES.some((range) => range === value);
}

function stripQuotes(value: string): string {
  return value.trim().replace(/^["'“”‘’]+|["'“”‘’]+$/g, '').trim();
}

/** Split `key: value` on the first ASCII or full-width colon. */
function splitLabelledLine(line: string): { label: string; value: string } | null {
  const separator = line.search(/[:：]/);
  if (separator === -1) return null;
  return { label: line.slice(0, separator).trim(), value: line.slice(separator + 1).trim() };
}

interface MarkedSpan {
  start: number;
  contentStart: number;
  contentEnd: number;
  end: number;
}

function isEntryLine(line: string): boolean {
  const parsed = splitLabelledLine(line.replace(/^[-*•]\s*/, ''));
  return parsed !== null && parsed.label.length > 0;
}

/**
 * An unclosed block holds the `key: value` lines that follow its marker and
 * stops at the first blank or unlabelled line after them.
 */
function unclosedBlockEnd(text: string, contentStart: number): number {
  let end = contentStart;
  let cursor = contentStart;
  let sawEntry = false;
  for (;;) {
    const newline = text.indexOf('\n', cursor);
    const lineEnd = newline === -1 ? text.length : newline;
    const line = text.slice(cursor, lineEnd).trim();
    if (line.length === 0) {
      if (sawEntry) break;
    } else if (isEntryLine(line)) {
      sawEntry = true;
      end = lineEnd;
    } else {
      break;
    }
    if (newline === -1) break;
    cursor = newline + 1;
  }
  return end;
}

/** Locate update blocks, closed or not. */
function findUpdateBlocks(text: string): MarkedSpan[] {
  const spans: MarkedSpan[] = [];
  let cursor = 0;
  while (cursor < text.length) {
    const start = text.indexOf(UPDATE_OPEN_MARKER, cursor);
    if (start === -1) break;
    const contentStart = start + UPDATE_OPEN_MARKER.length;
    const close = text.indexOf(UPDATE_CLOSE_MARKER, contentStart);
    if (close === -1) {
      const end = unclosedBlockEnd(text, contentStart);
      spans.push({ start, contentStart, contentEnd: end, end });
      break;
    }
    const end = close + UPDATE_CLOSE_MARKER.length;
    spans.push({ start, contentStart, contentEnd: close, end });
    cursor = end;
  }
  return spans;
}

export class MarkerResponseClassifier implements ResponseClassifier {
  isSearchReady(text: string): boolean {
    return READY_MARKERS.some((marker) => text.includes(marker));
  }

  extractProfileUpdates(text: string): UserProfile {
    const updates: UserProfile = {};
    for (const span of findUpdateBlocks(text)) {
      const block = text.slice(span.contentStart, span.contentEnd);
      for (const rawLine of block.split('\n')) {
        const parsed = splitLabelledLine(rawLine.trim().replace(/^[-*•]\s*/, ''));
        if (!parsed || !parsed.label) continue;
        updates[parsed.label] = parsed.value;
      }
    }
    return updates;
  }

  stripMarkers(text: string): string {
    let stripped = '';
    let cursor = 0;
    for (const span of findUpdateBlocks(text)) {
      stripped += text.slice(cursor, span.start);
      cursor = span.end;
    }
    stripped += text.slice(cursor);

    for (const marker of READY_MARKERS) {
      stripped = stripped.split(marker).join('');
    }
    return stripped.replace(/\n{3,}/g, '\n\n').trim();
  }

  needsRepair(reflection: string): boolean {
    return REPAIR_MARKERS.some((marker) => reflection.includes(marker));
  }

  parseStrategy(text: string, defaults: SearchStrategy): SearchStrategy {
    const strategy: SearchStrategy = {
      ...defaults,
      keywords: [...defaults.keywords],
      sources: [...defaults.sources],
    };

    for (const rawLine of text.split('\n')) {
      const parsed = splitLabelledLine(rawLine.trim());
      if (!parsed) continue;
      const label = parsed.label.toLowerCase();

      if (label.includes('关键词') || label.includes('keyword')) {
        const keywords = parsed.value
          .split(/[,，、]/)
          .map(stripQuotes)
          .filter((keyword) => keyword.length > 0);
        if (keywords.length > 0) strategy.keywords = keywords;
      } else if (label.includes('时间') || label.includes('time')) {
        const match = parsed.value.match(/past_(?:week|month|3months|year)/);
        if (match && isTimeRange(match[0])) strategy.timeRange = match[0];
      } else if (label.includes('目标数量') || label.includes('target')) {
        const match = parsed.value.match(/\d+/);
        const count = match ? Number.parseInt(match[0], 10) : Number.NaN;
        if (Number.isInteger(count) && count >= 1) strategy.targetCount = count;
      }
    }

    return strategy;
  }

  parseFilterIndices(text: string, candidateCount: number): number[] {
    const indices = new Set<number>();
    for (const line of text.split('\n')) {
      const lower = line.toLowerCase();
      if (!FILTER_LINE_HINTS.some((hint) => lower.includes(hint))) continue;
      for (const match of line.matchAll(/\[(\d+)\]/g)) {
        const index = Number.parseInt(match[1], 10) - 1;
        if (index >= 0 && index < candidateCount) indices.add(index);
      }
    }
    return [...indices].sort((a, b) => a - b);
  }

  extractSearchTerms(text: string): string[] {
    const lines = text.split('\n');
    const terms: string[] = [];

    for (const line of lines) {
      const lower = line.toLowerCase();
      if (!SEARCH_TERM_HINTS.some((hint) => lower.includes(hint))) continue;
      // Quoted phrases first; otherwise whatever follows the colon
      for (const match of line.matchAll(/["'“”]([^"'“”]+)["'“”]|[:：]\s*(.+)/g)) {
        const term = stripQuotes(match[1] ?? match[2] ?? '');
        if (term.length > 2) terms.push(term);
      }
    }

    if (terms.length === 0) {
      for (const line of lines) {
        const trimmed = line.trim();
        if (trimmed.length > 5 && trimmed.length < 100) terms.push(trimmed);
      }
    }

    return [...new Set(terms)].slice(0, MAX_SEARCH_TERMS);
  }
}

export const defaultResponseClassifier: ResponseClassifier = new MarkerResponseClassifier();
