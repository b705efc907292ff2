/**
 * Per-message orchestration.
 *
 * Drives one inbound message through classification, (for knowledge
 * questions) concurrent retrieval and fusion, generation and persistence.
 * Every message gets a reply: retrieval failures shrink the context,
 * generation failures and the per-message deadline produce the fallback
 * reply, and persistence failures are logged for operators after the reply
 * is settled.
 */

import type { AssistantConfig } from '../config/assistant-config.js';
import type { IntentClassifier, IntentDecision } from '../intent/types.js';
import type { ContextBundle, Retriever } from '../retrieval/types.js';
import { fuse } from '../retrieval/context-fuser.js';
import { retrieveAll, outcomeItems, type FanOutResult } from '../retrieval/fan-out.js';
import type { GenerationResult, GenerateOptions } from '../generation/response-generator.js';
import type { ConversationHistory } from '../generation/prompt-builder.js';
import type { Intent } from '../intent/types.js';
import {
  recentTurns,
  type ConversationStore,
  type SummarizeOutcome,
} from '../storage/conversation-store.js';
import { StateMachine, type OrchestratorState } from './states.js';
import { withDeadline, abortReason } from '../utils/deadline.js';
import { withRetry, RetryExhaustedError } from '../utils/retry.js';
import {
  DeadlineError,
  PersistenceError,
  SignalpathError,
  errorMessage,
  wrapError,
} from '../utils/errors.js';
import { createLogger, type Logger } from '../utils/logger.js';

const log = createLogger('orchestrator');

/** Delay before the second persistence attempt */
const PERSIST_BACKOFF_MS = 100;

export interface InboundMessage {
  sessionId: string;
  text: string;
  /** ISO-8601 */
  timestamp: string;
  sender?: string;
}

export interface OutboundReply {
  sessionId: string;
  replyText: string;
}

export interface MessageTrace {
  states: OrchestratorState[];
  intent: IntentDecision | null;
  retrieval: FanOutResult | null;
  bundle: ContextBundle | null;
  fallback: boolean;
  generationAttempts: number;
  /** Set when the message ended on the fallback path because of an error */
  error: SignalpathError | null;
  persisted: boolean;
  summarization: SummarizeOutcome | null;
  durationMs: number;
}

export interface MessageOutcome {
  reply: OutboundReply;
  trace: MessageTrace;
}

export interface ReplyGenerator {
  generate(
    history: ConversationHistory,
    intent: Intent,
    bundle?: ContextBundle,
    options?: GenerateOptions,
  ): Promise<GenerationResult>;
}

export type OrchestratorSettings = Pick<
  AssistantConfig,
  | 'knowledgeTopK'
  | 'webTopK'
  | 'retrievalTimeoutMs'
  | 'contextMaxChars'
  | 'perMessageDeadlineMs'
  | 'persistAttempts'
  | 'fallbackText'
>;

export interface OrchestratorDeps {
  classifier: IntentClassifier;
  knowledge: Retriever | null;
  web: Retriever | null;
  generator: ReplyGenerator;
  store: ConversationStore;
  settings: OrchestratorSettings;
}

interface Run {
  event: InboundMessage;
  /** Bound to the message's sessionId */
  log: Logger;
  machine: StateMachine;
  trace: MessageTrace;
}

export class Orchestrator {
  constructor(private readonly deps: OrchestratorDeps) {}

  async handleMessage(event: InboundMessage): Promise<MessageOutcome> {
    const start = Date.now();
    const { settings } = this.deps;
    const run: Run = {
      event,
      log: log.child({ sessionId: event.sessionId }),
      machine: new StateMachine(),
      trace: {
        states: [],
        intent: null,
        retrieval: null,
        bundle: null,
        fallback: false,
        generationAttempts: 0,
        error: null,
        persisted: false,
        summarization: null,
        durationMs: 0,
      },
    };

    let result: GenerationResult;
    try {
      result = await withDeadline((signal) => this.respond(run, signal), {
        timeoutMs: settings.perMessageDeadlineMs,
        code: 'MESSAGE_DEADLINE',
        label: 'message',
      });
    } catch (error) {
      const wrapped = wrapError(error);
      run.trace.error = wrapped;
      run.log.error(
        error instanceof DeadlineError ? 'Message deadline exceeded' : 'Message processing failed',
        {
          stage: run.machine.state,
          code: wrapped.code,
          error: wrapped.message,
        },
      );
      result = { text: settings.fallbackText, fallback: true, attempts: run.trace.generationAttempts };
    }

    run.trace.fallback = result.fallback;
    run.trace.generationAttempts = result.attempts;

    run.machine.transition('persisting');
    await this.persist(run, result.text);
    run.machine.transition('done');

    run.trace.states = run.machine.visited;
    run.trace.durationMs = Date.now() - start;

    run.log.info('Message handled', {
      intent: run.trace.intent?.intent,
      fallback: result.fallback,
      persisted: run.trace.persisted,
      durationMs: run.trace.durationMs,
    });

    return {
      reply: { sessionId: event.sessionId, replyText: result.text },
      trace: run.trace,
    };
  }

  /**
   * Everything up to a reply. Runs under the per-message deadline; stops
   * advancing once `signal` aborts.
   */
  private async respond(run: Run, signal: AbortSignal): Promise<GenerationResult> {
    const { event, trace } = run;
    const { settings } = this.deps;
    const advance = (to: OrchestratorState): void => {
      if (signal.aborted) throw abortReason(signal, 'message');
      run.machine.transition(to);
    };

    const session = await this.deps.store.get(event.sessionId);
    const history: ConversationHistory = {
      summary: session.summary,
      recentTurns: recentTurns(session),
      message: event.text,
    };
    const options: GenerateOptions = { signal, sessionId: event.sessionId };

    advance('classifying');
    const decision = await this.classify(run, session.summary, signal);
    trace.intent = decision;

    switch (decision.intent) {
      case 'small_talk': {
        advance('small_talk_generating');
        return this.deps.generator.generate(history, 'small_talk', undefined, options);
      }
      case 'rag_query': {
        advance('retrieving');
        const outcomes = await retrieveAll({
          query: event.text,
          knowledge: this.deps.knowledge,
          web: this.deps.web,
          knowledgeTopK: settings.knowledgeTopK,
          webTopK: settings.webTopK,
          timeoutMs: settings.retrievalTimeoutMs,
          signal,
          sessionId: event.sessionId,
        });
        trace.retrieval = outcomes;

        advance('fusing');
        const bundle = fuse(outcomeItems(outcomes.knowledge), outcomeItems(outcomes.web), {
          knowledgeTopK: settings.knowledgeTopK,
          webTopK: settings.webTopK,
          maxChars: settings.contextMaxChars,
        });
        trace.bundle = bundle;

        advance('generating');
        return this.deps.generator.generate(history, 'rag_query', bundle, options);
      }
    }
  }

  private async classify(
    { event, log: runLog }: Run,
    summary: string | null,
    signal: AbortSignal,
  ): Promise<IntentDecision> {
    try {
      return await this.deps.classifier.classify(event.text, summary, signal);
    } catch (error) {
      if (signal.aborted) throw abortReason(signal, 'message');
      runLog.warn('Classifier threw, defaulting to rag_query', {
        stage: 'classifying',
        error: errorMessage(error),
      });
      return { intent: 'rag_query', reason: 'classifier_failure' };
    }
  }

  /**
   * Append the exchange, then summarize if the session grew past its
   * thresholds. Failures are logged, never thrown.
   */
  private async persist(run: Run, replyText: string): Promise<void> {
    const { event, trace } = run;
    const { store, settings } = this.deps;
    const persistLog = run.log.child({ stage: 'persisting' });

    try {
      await withRetry(
        'persist exchange',
        () =>
          store.appendExchange(event.sessionId, [
            {
              role: 'user',
              text: event.text,
              timestamp: event.timestamp,
              intent: trace.intent?.intent ?? null,
            },
            { role: 'assistant', text: replyText, timestamp: new Date().toISOString() },
          ]),
        {
          maxAttempts: settings.persistAttempts,
          initialDelayMs: PERSIST_BACKOFF_MS,
          backoffFactor: 2,
          logger: persistLog,
        },
      );
      trace.persisted = true;
    } catch (error) {
      const cause = error instanceof RetryExhaustedError ? error.lastError : error;
      const exhausted = new PersistenceError(
        `Could not persist exchange for session ${event.sessionId}`,
        'PERSISTENCE_EXHAUSTED',
        cause,
      );
      persistLog.error(exhausted.message, { error: exhausted.toDetailedString() });
      return;
    }

    try {
      trace.summarization = await store.maybeSummarize(event.sessionId);
    } catch (error) {
      const failed = new PersistenceError(
        `Summarization check failed for session ${event.sessionId}`,
        'SUMMARY_APPLY_FAILED',
        error,
      );
      persistLog.error(failed.message, { error: errorMessage(error) });
      trace.summarization = { status: 'failed', error: failed };
    }
  }
}
