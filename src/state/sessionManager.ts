import { CFG } from '../config';
import { TemplateSelector, type SelectorOptions } from '../engine/selector';
import type { Answer, SelectionLogic, SelectionResult, TemplateCatalog } from '../types';
import { SessionNotFoundError } from '../util/errors';
import { log as rootLog, type Logger } from '../util/logger';

export interface SessionState {
  sessionId: string;
  startTime: number;
  lastActivityTime: number;
  answersRecorded: number;
  selector: TemplateSelector;
  lastResult?: SelectionResult;
}

export interface SessionManagerOptions extends SelectorOptions {
  maxSessions?: number;
  logger?: Logger;
  now?: () => number;
}

/**
 * One configuration pair, many conversations. Each conversation owns its own
 * TemplateSelector; the catalog and selection logic are shared read-only.
 * Sessions live in memory only and are gone after a restart.
 */
export class SessionManager {
  private sessions: Map<string, SessionState> = new Map();
  private readonly maxSessions: number;
  private readonly selectorOptions: SelectorOptions;
  private readonly log: Logger;
  private readonly now: () => number;

  constructor(
    private readonly catalog: TemplateCatalog,
    private readonly logic: SelectionLogic,
    options: SessionManagerOptions = {}
  ) {
    const { maxSessions = CFG.MAX_SESSIONS, logger = rootLog, now = Date.now, ...selectorOptions } = options;
    this.maxSessions = maxSessions;
    this.selectorOptions = selectorOptions;
    this.log = logger.child({ component: 'SessionManager' });
    this.now = now;
  }

  /** Returns the existing session for this id, or starts a new one. */
  openSession(sessionId: string): SessionState {
    const existing = this.sessions.get(sessionId);
    if (existing) return existing;

    if (this.sessions.size >= this.maxSessions) {
      this.evictLeastRecent();
    }

    const startTime = this.now();
    const session: SessionState = {
      sessionId,
      startTime,
      lastActivityTime: startTime,
      answersRecorded: 0,
      selector: new TemplateSelector(this.catalog, this.logic, this.selectorOptions)
    };
    this.sessions.set(sessionId, session);
    this.log.info({ sessionId }, 'Created session');
    return session;
  }

  getSession(sessionId: string): SessionState {
    const session = this.sessions.get(sessionId);
    if (!session) {
      throw new SessionNotFoundError(sessionId);
    }
    return session;
  }

  hasSession(sessionId: string): boolean {
    return this.sessions.has(sessionId);
  }

  /** Current question or, once the tree is exhausted, the resolved template. */
  currentResult(sessionId: string): SelectionResult {
    return this.track(this.getSession(sessionId), session => session.selector.advance());
  }

  recordAnswer(sessionId: string, stepId: string, answer: Answer): SelectionResult {
    const result = this.track(this.getSession(sessionId), session => {
      session.answersRecorded += 1;
      return session.selector.recordAnswer(stepId, answer);
    });
    this.log.debug({ sessionId, stepId, resultKind: result.kind }, 'Recorded answer');
    if (result.kind === 'template') {
      this.log.info({ sessionId, template: result.template, source: result.source }, 'Template resolved');
    }
    return result;
  }

  resetSession(sessionId: string): void {
    const session = this.getSession(sessionId);
    session.selector.reset();
    session.answersRecorded = 0;
    session.lastResult = undefined;
    session.lastActivityTime = this.now();
    this.log.info({ sessionId }, 'Reset session');
  }

  endSession(sessionId: string): boolean {
    const removed = this.sessions.delete(sessionId);
    if (removed) this.log.info({ sessionId }, 'Ended session');
    return removed;
  }

  cleanupOldSessions(maxAge: number = CFG.SESSION_MAX_AGE_MS): number {
    const cutoff = this.now() - maxAge;
    const toDelete: string[] = [];

    for (const [sessionId, session] of this.sessions.entries()) {
      if (session.lastActivityTime < cutoff) {
        toDelete.push(sessionId);
      }
    }

    toDelete.forEach(sessionId => this.sessions.delete(sessionId));

    if (toDelete.length > 0) {
      this.log.info({ removed: toDelete.length }, 'Cleaned up idle sessions');
    }

    return toDelete.length;
  }

  getSessionStats(): { total: number; resolved: number; inProgress: number } {
    const all = Array.from(this.sessions.values());
    const resolved = all.filter(s => s.lastResult?.kind === 'template').length;
    return { total: all.length, resolved, inProgress: all.length - resolved };
  }

  private track(session: SessionState, step: (session: SessionState) => SelectionResult): SelectionResult {
    const result = step(session);
    session.lastResult = result;
    session.lastActivityTime = this.now();
    return result;
  }

  private evictLeastRecent(): void {
    let oldest: SessionState | undefined;
    for (const session of this.sessions.values()) {
      if (!oldest || session.lastActivityTime < oldest.lastActivityTime) {
        oldest = session;
      }
    }
    if (oldest) {
      this.sessions.delete(oldest.sessionId);
      this.log.warn({ sessionId: oldest.sessionId, maxSessions: this.maxSessions }, 'Session limit reached; evicted least recent session');
    }
  }
}
