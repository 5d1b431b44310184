import { SEARCH_SOURCES, type SearchSource } from '@radar/shared';
import { SessionNotFoundError } from '../errors';
import type { ChatCompletionClient } from '../llm';
import { log } from '../logging';
import { generateId } from '../../utils/id';
import { IntentCollector, type IntentCollectorOptions } from './collector';

export interface IntentSession {
  id: string;
  collector: IntentCollector;
  sources: SearchSource[];
  createdAt: Date;
  lastActiveAt: Date;
}

export type SessionOptions = Pick<IntentCollectorOptions, 'maxQuestions' | 'sources'>;

export interface SessionLimits {
  /** Oldest idle sessions are evicted to stay at or under this count */
  maxSessions?: number;
  /** Sessions untouched for longer than this are dropped */
  idleTtlMs?: number;
  now?: () => Date;
}

/**
 * In-memory registry of interview sessions. Every session owns its own
 * collector, so conversations never share profile or transcript.
 * Map order doubles as recency order: a touched session moves to the end.
 */
export class IntentSessionStore {
  private readonly sessions = new Map<string, IntentSession>();
  private readonly maxSessions: number;
  private readonly idleTtlMs: number;
  private readonly now: () => Date;

  constructor(
    private readonly llm: ChatCompletionClient,
    private readonly defaults: Omit<IntentCollectorOptions, 'sessionId'> = {},
    limits: SessionLimits = {}
  ) {
    this.maxSessions = limits.maxSessions ?? Number.POSITIVE_INFINITY;
    this.idleTtlMs = limits.idleTtlMs ?? Number.POSITIVE_INFINITY;
    this.now = limits.now ?? (() => new Date());
  }

  create(options: SessionOptions = {}): IntentSession {
    this.evictExpired();
    while (this.sessions.size >= this.maxSessions) {
      const oldest = this.sessions.keys().next();
      if (oldest.done) break;
      this.evict(oldest.value, 'capacity');
    }

    const id = generateId();
    const collectorOptions: IntentCollectorOptions = {
      ...this.defaults,
      maxQuestions: options.maxQuestions ?? this.defaults.maxQuestions,
      sources: options.sources ?? this.defaults.sources,
      sessionId: id,
    };
    const collector = new IntentCollector(this.llm, collectorOptions);
    const session: IntentSession = {
      id,
      collector,
      sources: [...(collectorOptions.sources ?? SEARCH_SOURCES)],
      createdAt: this.now(),
      lastActiveAt: this.now(),
    };
    this.sessions.set(id, session);
    log({ level: 'info', component: 'IntentSessions', message: 'Session created', sessionId: id });
    return session;
  }

  /** Throws `SessionNotFoundError` for unknown ids. */
  get(id: string): IntentSession {
    this.evictExpired();
    const session = this.sessions.get(id);
    if (!session) {
      throw new SessionNotFoundError(id);
    }
    session.lastActiveAt = this.now();
    this.sessions.delete(id);
    this.sessions.set(id, session);
    return session;
  }

  reset(id: string): IntentSession {
    const session = this.get(id);
    session.collector.reset();
    log({ level: 'info', component: 'IntentSessions', message: 'Session reset', sessionId: id });
    return session;
  }

  delete(id: string): void {
    if (!this.sessions.delete(id)) {
      throw new SessionNotFoundError(id);
    }
    log({ level: 'info', component: 'IntentSessions', message: 'Session deleted', sessionId: id });
  }

  private evictExpired(): void {
    const cutoff = this.now().getTime() - this.idleTtlMs;
    for (const [id, session] of this.sessions) {
      if (session.lastActiveAt.getTime() >= cutoff) break;
      this.evict(id, 'idle');
    }
  }

  private evict(id: string, reason: 'idle' | 'capacity'): void {
    this.sessions.delete(id);
    log({ level: 'info', component: 'IntentSessions', message: `Session evicted (${reason})`, sessionId: id });
  }

  get size(): number {
    return this.sessions.size;
  }
}
