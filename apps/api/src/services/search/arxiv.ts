/**
 * ArxivClient - paper search over the official arXiv Atom API
 *
 * arXiv API quirks:
 * 1. Multi-word queries need each word prefixed with a field and joined by AND:
 *    `all:AI+AND+all:agent`, not `all:AI+agent` (which parses as OR).
 * 2. Square brackets in the submittedDate range must be sent as %5B / %5D.
 * 3. Dates are YYYYMMDDHHMM in GMT.
 */

import type { PaperResult } from '@radar/shared';
import { log } from '../logging';
import { requestUpstream, USER_AGENT } from './http';
import { formatDate, isWithinWindow } from './time-range';
import type { DateWindow, SearchSourceClient } from './types';

const BASE_URL = 'https://export.arxiv.org/api/query';
const BATCH_SIZE = 50;

function decodeEntities(text: string): string {
  return text
    .replace(/<[^>]+>/g, '')
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&quot;/g, '"')
    .replace(/&#39;/g, "'")
    .replace(/&amp;/g, '&');
}

function cleanText(text: string): string {
  return decodeEntities(text).replace(/\s+/g, ' ').trim();
}

function toArxivStamp(date: Date, endOfDay: boolean): string {
  return formatDate(date).replace(/-/g, '') + (endOfDay ? '2359' : '0000');
}

export function buildArxivQuery(query: string, window: DateWindow): string {
  const terms = query
    .trim()
    .split(/\s+/)
    .filter((term) => term.length > 0)
    .map((term) => `all:${encodeURIComponent(term)}`);
  const range = `submittedDate:%5B${toArxivStamp(window.start, false)}+TO+${toArxivStamp(window.end, true)}%5D`;
  return [...terms, range].join('+AND+');
}

interface ParsedEntry {
  paper: PaperResult;
  publishedAt: Date;
}

/** Regex over the Atom feed; entries without an id, title or valid date are skipped. */
export function parseArxivFeed(xml: string): ParsedEntry[] {
  const entries: ParsedEntry[] = [];
  for (const match of xml.matchAll(/<entry>([\s\S]*?)<\/entry>/g)) {
    const entry = match[1];
    const titleMatch = entry.match(/<title>([\s\S]*?)<\/title>/);
    const idMatch = entry.match(/<id>([^<]+)<\/id>/);
    const publishedMatch = entry.match(/<published>([^<]+)<\/published>/);
    if (!titleMatch || !idMatch || !publishedMatch) continue;

    const publishedAt = new Date(publishedMatch[1].trim());
    if (Number.isNaN(publishedAt.getTime())) continue;

    const arxivId = (idMatch[1].trim().split('/abs/').pop() ?? '').replace(/v\d+$/, '');
    if (!arxivId) continue;

    const summaryMatch = entry.match(/<summary>([\s\S]*?)<\/summary>/);
    const authors = [...entry.matchAll(/<name>([\s\S]*?)<\/name>/g)]
      .map((author) => cleanText(author[1]))
      .filter((name) => name.length > 0);
    const categories = [...entry.matchAll(/<category[^>]*term="([^"]+)"/g)].map((category) => category[1]);
    const pdfLink = [...entry.matchAll(/<link[^>]*>/g)]
      .map((link) => link[0])
      .find((link) => link.includes('title="pdf"'));
    const pdfUrl = pdfLink?.match(/href="([^"]+)"/)?.[1];

    entries.push({
      publishedAt,
      paper: {
        kind: 'paper',
        source: 'arxiv',
        title: cleanText(titleMatch[1]),
        url: `https://arxiv.org/abs/${arxivId}`,
        authors,
        abstract: summaryMatch ? cleanText(summaryMatch[1]) : '',
        published: formatDate(publishedAt),
        pdfUrl,
        categories,
      },
    });
  }
  return entries;
}

export interface ArxivClientOptions {
  timeoutMs?: number;
}

export class ArxivClient implements SearchSourceClient<PaperResult> {
  readonly source = 'arxiv' as const;
  private readonly timeoutMs: number;

  constructor(options: ArxivClientOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 30000;
  }

  /** Newest submissions first, fetched in batches of 50 until `limit` papers fall inside the window. */
  async search(query: string, window: DateWindow, limit: number): Promise<PaperResult[]> {
    const papers: PaperResult[] = [];
    let offset = 0;

    while (papers.length < limit) {
      const batchSize = Math.min(BATCH_SIZE, limit - papers.length);
      const entries = await this.fetchBatch(query, window, offset, batchSize);
      const inWindow = entries.filter((entry) => isWithinWindow(entry.publishedAt, window));
      if (inWindow.length === 0) break;

      papers.push(...inWindow.map((entry) => entry.paper));
      offset += batchSize;
      if (inWindow.length < batchSize) break;
    }

    return papers.slice(0, limit);
  }

  private async fetchBatch(query: string, window: DateWindow, start: number, maxResults: number): Promise<ParsedEntry[]> {
    // Built by hand so the pre-encoded %5B/%5D are not encoded twice
    const url =
      `${BASE_URL}?search_query=${buildArxivQuery(query, window)}` +
      `&start=${start}&max_results=${maxResults}&sortBy=submittedDate&sortOrder=descending`;
    log({ level: 'debug', component: 'ArxivClient', message: `Fetching: ${url}` });

    const response = await requestUpstream('arxiv', url, { headers: { 'User-Agent': USER_AGENT } }, this.timeoutMs);
    return parseArxivFeed(await response.text());
  }
}
