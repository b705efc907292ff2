/**
 * Per-session conversation history with a rolling summary.
 *
 * The turn log is append-only. Older turns are periodically folded into a
 * summary by an injected Summarizer; folded turns stay stored but drop out
 * of the recent view used for prompting.
 *
 * All mutation of one session runs inside a per-session lock. The
 * summarizer (a model call) runs outside the lock: candidate turns are
 * snapshotted under the lock, the summary is produced without it, and the
 * result is applied under the lock only if no other summary landed in
 * between. A summarizer that overruns `timeoutMs` is aborted and the
 * session is left as it was.
 *
 * @module storage/conversation-store
 */

import type Database from 'better-sqlite3-multiple-ciphers';
import { getDb } from './db.js';
import type { Session, Turn, TurnInput, Role } from './types.js';
import type { Intent } from '../intent/types.js';
import { KeyedMutex } from '../utils/keyed-mutex.js';
import { approximateTokens } from '../utils/token-counter.js';
import { withDeadline } from '../utils/deadline.js';
import {
  DeadlineError,
  GenerationError,
  PersistenceError,
  type SignalpathError,
  errorMessage,
} from '../utils/errors.js';
import { createLogger, type Logger } from '../utils/logger.js';

const log = createLogger('conversation-store');

/**
 * Produces an updated summary from the turns being folded and the summary
 * that already covers older turns.
 */
export interface Summarizer {
  summarize(turns: Turn[], priorSummary: string | null, signal?: AbortSignal): Promise<string>;
}

export interface SummarizationPolicy {
  /** Summarize when unsummarized turns exceed this count */
  turnThreshold: number;
  /** ...or when their approximate token total exceeds this */
  tokenThreshold: number;
  /** Newest turns left out of the fold */
  retainRecentTurns: number;
  /** Deadline for one summarizer call */
  timeoutMs: number;
}

export const DEFAULT_SUMMARIZATION_POLICY: SummarizationPolicy = {
  turnThreshold: 6,
  tokenThreshold: 2000,
  retainRecentTurns: 2,
  timeoutMs: 30_000,
};

export type SummarizeSkipReason = 'below_threshold' | 'in_progress' | 'stale' | 'no_summarizer';

export type SummarizeOutcome =
  | { status: 'summarized'; summarizedThroughSeq: number; foldedTurns: number }
  | { status: 'skipped'; reason: SummarizeSkipReason }
  | { status: 'failed'; error: SignalpathError };

export interface ConversationStoreOptions {
  /** Defaults to the shared connection from getDb() */
  db?: Database.Database;
  summarizer?: Summarizer;
  policy?: Partial<SummarizationPolicy>;
}

interface SessionRow {
  id: string;
  summary: string | null;
  summarized_through_seq: number;
  created_at: string;
  updated_at: string;
}

interface TurnRow {
  seq: number;
  role: Role;
  text: string;
  timestamp: string;
  intent: Intent | null;
}

interface SummaryPlan {
  baseSeq: number;
  priorSummary: string | null;
  fold: Turn[];
}

/**
 * Turns not yet folded into the summary, oldest first.
 */
export function recentTurns(session: Session): Turn[] {
  return session.turns.filter((t) => t.seq > session.summarizedThroughSeq);
}

export class ConversationStore {
  private readonly mutex = new KeyedMutex();
  private readonly summarizing = new Set<string>();
  private readonly policy: SummarizationPolicy;
  private readonly summarizer?: Summarizer;
  private readonly db?: Database.Database;

  constructor(options: ConversationStoreOptions = {}) {
    this.db = options.db;
    this.summarizer = options.summarizer;
    this.policy = { ...DEFAULT_SUMMARIZATION_POLICY, ...options.policy };
  }

  private getDatabase(): Database.Database {
    return this.db ?? getDb();
  }

  /**
   * Append one turn, creating the session on first use.
   */
  async append(sessionId: string, turn: TurnInput): Promise<Turn> {
    const [stored] = await this.appendExchange(sessionId, [turn]);
    return stored;
  }

  /**
   * Append turns atomically, in order, with consecutive sequence numbers.
   * Used for the user/assistant pair of one exchange so overlapping
   * messages in a session cannot interleave halves of a pair.
   */
  async appendExchange(sessionId: string, turns: TurnInput[]): Promise<Turn[]> {
    if (turns.length === 0) return [];

    return this.mutex.runExclusive(sessionId, () => {
      const db = this.getDatabase();
      const now = new Date().toISOString();

      const write = (): Turn[] => {
        db.prepare(
          `INSERT INTO sessions (id, created_at, updated_at) VALUES (?, ?, ?)
           ON CONFLICT(id) DO UPDATE SET updated_at = excluded.updated_at`,
        ).run(sessionId, now, now);

        const { maxSeq } = db
          .prepare('SELECT COALESCE(MAX(seq), 0) as maxSeq FROM turns WHERE session_id = ?')
          .get(sessionId) as { maxSeq: number };

        const insert = db.prepare(
          'INSERT INTO turns (session_id, seq, role, text, timestamp, intent) VALUES (?, ?, ?, ?, ?, ?)',
        );

        return turns.map((input, i) => {
          const turn: Turn = {
            seq: maxSeq + i + 1,
            role: input.role,
            text: input.text,
            timestamp: input.timestamp,
            intent: input.intent ?? null,
          };
          insert.run(sessionId, turn.seq, turn.role, turn.text, turn.timestamp, turn.intent);
          return turn;
        });
      };

      try {
        return db.transaction(write)();
      } catch (error) {
        throw new PersistenceError(
          `Failed to append ${turns.length} turn(s) to session ${sessionId}: ${errorMessage(error)}`,
          'APPEND_FAILED',
          error,
        );
      }
    });
  }

  /**
   * Read a session. Unknown ids yield an empty, unpersisted view.
   */
  async get(sessionId: string): Promise<Session> {
    return this.read(sessionId);
  }

  private read(sessionId: string): Session {
    const db = this.getDatabase();
    const row = db.prepare('SELECT * FROM sessions WHERE id = ?').get(sessionId) as
      | SessionRow
      | undefined;

    if (!row) {
      return {
        id: sessionId,
        turns: [],
        summary: null,
        summarizedThroughSeq: 0,
        createdAt: null,
        updatedAt: null,
      };
    }

    const turns = db
      .prepare(
        'SELECT seq, role, text, timestamp, intent FROM turns WHERE session_id = ? ORDER BY seq',
      )
      .all(sessionId) as TurnRow[];

    return {
      id: row.id,
      turns,
      summary: row.summary,
      summarizedThroughSeq: row.summarized_through_seq,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
    };
  }

  /**
   * Fold older turns into the summary when the unsummarized tail is too
   * long. A call with nothing new to fold is a no-op.
   *
   * Only one summarization runs per session at a time; a concurrent call
   * returns `in_progress` instead of waiting.
   */
  async maybeSummarize(sessionId: string): Promise<SummarizeOutcome> {
    const summarizer = this.summarizer;
    if (!summarizer) {
      return { status: 'skipped', reason: 'no_summarizer' };
    }
    if (this.summarizing.has(sessionId)) {
      return { status: 'skipped', reason: 'in_progress' };
    }

    this.summarizing.add(sessionId);
    try {
      const plan = await this.mutex.runExclusive(sessionId, () => this.planSummary(sessionId));
      if (!plan) {
        return { status: 'skipped', reason: 'below_threshold' };
      }

      const sessionLog = log.child({ sessionId, stage: 'summarizing' });
      let summary: string;
      try {
        summary = await withDeadline(
          (signal) => summarizer.summarize(plan.fold, plan.priorSummary, signal),
          { timeoutMs: this.policy.timeoutMs, code: 'SUMMARY_TIMEOUT', label: 'summarization' },
        );
      } catch (error) {
        const wrapped =
          error instanceof GenerationError
            ? error
            : new GenerationError(
                `Summarization failed: ${errorMessage(error)}`,
                error instanceof DeadlineError ? 'SUMMARY_TIMEOUT' : 'SUMMARY_FAILED',
                error,
              );
        sessionLog.warn('Summarization failed, session left unchanged', { error: wrapped.message });
        return { status: 'failed', error: wrapped };
      }

      return await this.mutex.runExclusive(sessionId, () =>
        this.applySummary(sessionId, plan, summary, sessionLog),
      );
    } finally {
      this.summarizing.delete(sessionId);
    }
  }

  private planSummary(sessionId: string): SummaryPlan | null {
    const session = this.read(sessionId);
    const unsummarized = recentTurns(session);

    const tokens = unsummarized.reduce((sum, t) => sum + approximateTokens(t.text), 0);
    const overTurns = unsummarized.length > this.policy.turnThreshold;
    const overTokens = tokens > this.policy.tokenThreshold;
    if (!overTurns && !overTokens) return null;

    const foldCount = unsummarized.length - this.policy.retainRecentTurns;
    if (foldCount <= 0) return null;

    return {
      baseSeq: session.summarizedThroughSeq,
      priorSummary: session.summary,
      fold: unsummarized.slice(0, foldCount),
    };
  }

  private applySummary(
    sessionId: string,
    plan: SummaryPlan,
    summary: string,
    sessionLog: Logger,
  ): SummarizeOutcome {
    const db = this.getDatabase();
    const row = db
      .prepare('SELECT summarized_through_seq FROM sessions WHERE id = ?')
      .get(sessionId) as { summarized_through_seq: number } | undefined;

    if (!row || row.summarized_through_seq !== plan.baseSeq) {
      sessionLog.debug('Discarding stale summary', { baseSeq: plan.baseSeq });
      return { status: 'skipped', reason: 'stale' };
    }

    const throughSeq = plan.fold[plan.fold.length - 1].seq;
    try {
      db.prepare(
        'UPDATE sessions SET summary = ?, summarized_through_seq = ?, updated_at = ? WHERE id = ?',
      ).run(summary, throughSeq, new Date().toISOString(), sessionId);
    } catch (error) {
      const wrapped = new PersistenceError(
        `Failed to store summary for session ${sessionId}`,
        'SUMMARY_APPLY_FAILED',
        error,
      );
      sessionLog.error(wrapped.message, { error: errorMessage(error) });
      return { status: 'failed', error: wrapped };
    }

    sessionLog.info('Session summarized', { throughSeq, folded: plan.fold.length });
    return { status: 'summarized', summarizedThroughSeq: throughSeq, foldedTurns: plan.fold.length };
  }
}
