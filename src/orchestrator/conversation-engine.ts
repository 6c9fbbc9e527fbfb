import { v4 as uuidv4 } from 'uuid';
import type { Logger } from 'pino';
import { IntentResult, SessionMessage, SessionRecord } from '../config/types';
import { SessionStore } from '../session/types';
import { IntentClassifier } from '../classifier/types';
import { CatalogAdapter, CatalogResult } from '../catalog/types';
import { KnowledgeAdapter } from '../knowledge/types';
import { stateMachine } from './state-machine';
import { EscalationCoordinator } from './escalation-coordinator';
import { SessionLock } from './session-lock';
import { isAffirmative, isEndPhrase, isNegative } from './text-signals';
import {
  REPLIES,
  alreadyHandedOff,
  catalogItemsReply,
  goodbye,
  sessionEnded,
} from './replies';
import { AdapterName, AdapterUnavailableError, PersistenceError, TurnAbortedError, ValidationError } from './errors';
import { TurnOptions, TurnResult } from './types';
import { env } from '../config/env';
import { turnLogger } from '../observability/logger';
import { TraceContext, createTraceContext, endSpan, startSpan, summarizeSpans } from '../observability/trace';
import { adapterFailures, intentsClassified, turnDuration, turnsTotal } from '../observability/metrics';

export interface EngineOptions {
  /** Messages of history handed to the classifier */
  historyWindow?: number;
  endPhrases?: readonly string[];
  maxMessageLength?: number;
  now?: () => number;
  generateSessionId?: () => string;
}

interface StepOutcome {
  responseText: string;
  /** The user asked to end the conversation */
  ended: boolean;
}

/**
 * Runs one turn of the store assistant per call.
 *
 * Each turn loads the session (or starts one), appends the user message,
 * advances the mode state machine, calls at most one lookup adapter,
 * appends the reply and saves the whole session in a single write.
 * Turns of one session are serialized; different sessions run in parallel.
 */
export class ConversationEngine {
  private readonly lock = new SessionLock();
  private readonly coordinator: EscalationCoordinator;
  private readonly historyWindow: number;
  private readonly endPhrases: readonly string[];
  private readonly maxMessageLength: number;
  private readonly now: () => number;
  private readonly generateSessionId: () => string;

  constructor(
    private readonly store: SessionStore,
    private readonly classifier: IntentClassifier,
    private readonly catalog: CatalogAdapter,
    private readonly knowledge: KnowledgeAdapter,
    options: EngineOptions = {},
  ) {
    this.historyWindow = options.historyWindow ?? env.classifier.historyWindow;
    this.endPhrases = options.endPhrases ?? env.session.endPhrases;
    this.maxMessageLength = options.maxMessageLength ?? env.session.maxMessageLength;
    this.now = options.now ?? Date.now;
    this.generateSessionId = options.generateSessionId ?? (() => uuidv4());
    this.coordinator = new EscalationCoordinator(this.now);
  }

  async handleTurn(sessionId: string | undefined, userText: string, options: TurnOptions = {}): Promise<TurnResult> {
    const text = userText.trim();
    if (!text) {
      throw new ValidationError('Message text must not be empty');
    }
    if (text.length > this.maxMessageLength) {
      throw new ValidationError(`Message text must be at most ${this.maxMessageLength} characters`);
    }

    const id = sessionId?.trim() || this.generateSessionId();
    return this.lock.run(id, () => this.runTurn(id, text, options));
  }

  /** Read-only view of a stored session */
  async getSession(sessionId: string): Promise<SessionRecord | null> {
    try {
      return await this.store.get(sessionId);
    } catch (err) {
      throw toPersistenceError(sessionId, 'Session could not be loaded', err);
    }
  }

  private async runTurn(sessionId: string, text: string, options: TurnOptions): Promise<TurnResult> {
    const trace = createTraceContext({ requestId: options.requestId, sessionId });
    const log = turnLogger(trace.requestId, sessionId);
    const startedAt = Date.now();
    const endTimer = turnDuration.startTimer();

    try {
      this.throwIfAborted(sessionId, options.signal);

      // 1. Load or create the session; all changes go to this private copy
      const spanLoad = startSpan(trace, 'session.load');
      let stored: SessionRecord | null;
      try {
        stored = await this.store.get(sessionId);
      } catch (err) {
        endSpan(spanLoad, 'error');
        throw toPersistenceError(sessionId, 'Session could not be loaded', err);
      }
      endSpan(spanLoad);

      const session = stored ? structuredClone(stored) : this.createSession(sessionId, log);

      // 2. Append the user message
      const userMessage: SessionMessage = { role: 'user', text, timestamp: this.now() };
      session.messages.push(userMessage);

      // 3. Advance the state machine
      const outcome = await this.step(session, userMessage, trace, log);

      // 4. Append the reply
      const timestamp = this.now();
      session.messages.push({ role: 'assistant', text: outcome.responseText, timestamp });
      session.lastActivityAt = timestamp;

      // 5. Commit
      this.throwIfAborted(sessionId, options.signal);
      const spanSave = startSpan(trace, 'session.save');
      try {
        await this.store.save(session);
      } catch (err) {
        endSpan(spanSave, 'error');
        throw toPersistenceError(sessionId, 'Session could not be saved', err);
      }
      endSpan(spanSave);

      turnsTotal.inc({ mode: session.mode, outcome: 'ok' });
      log.info(
        { mode: session.mode, messageCount: session.messages.length, durationMs: Date.now() - startedAt, spans: summarizeSpans(trace) },
        'Turn completed',
      );

      return {
        responseText: outcome.responseText,
        continue: !outcome.ended && session.mode !== 'Closed',
        sessionId,
        session: structuredClone(session),
      };
    } catch (err) {
      if (err instanceof TurnAbortedError) {
        turnsTotal.inc({ mode: 'unknown', outcome: 'aborted' });
        log.info('Turn aborted before commit');
      } else {
        turnsTotal.inc({ mode: 'unknown', outcome: 'failed' });
        log.error({ err }, 'Turn failed');
      }
      throw err;
    } finally {
      endTimer();
    }
  }

  private async step(
    session: SessionRecord,
    message: SessionMessage,
    trace: TraceContext,
    log: Logger,
  ): Promise<StepOutcome> {
    const text = message.text;

    // Terminal modes answer with a fixed notice and never call an adapter
    if (stateMachine.isTerminal(session.mode)) {
      if (session.mode === 'Closed') {
        return { responseText: sessionEnded(session.sessionId), ended: true };
      }
      if (isEndPhrase(text, this.endPhrases)) {
        return { responseText: goodbye(session.sessionId), ended: true };
      }
      return {
        responseText: alreadyHandedOff(session.escalation?.inquiryId ?? null, session.sessionId),
        ended: false,
      };
    }

    if (isEndPhrase(text, this.endPhrases)) {
      const { newMode } = stateMachine.transition(session.sessionId, session.mode, 'Closed', 'end_phrase');
      session.mode = newMode;
      session.closedAt = this.now();
      session.escalationOfferPending = false;
      session.pendingInquiry = undefined;
      return { responseText: goodbye(session.sessionId), ended: true };
    }

    if (session.mode === 'Escalating') {
      const result = this.coordinator.advance(session, text);
      return { responseText: result.responseText, ended: false };
    }

    // Answer to "would you like to talk to our team?"
    if (session.escalationOfferPending) {
      session.escalationOfferPending = false;
      if (isAffirmative(text)) {
        const result = this.coordinator.begin(session, this.offerQuery(session), 'escalation_offer_accepted');
        return { responseText: result.responseText, ended: false };
      }
      if (isNegative(text)) {
        return { responseText: REPLIES.moreHelp, ended: false };
      }
    }

    // A catalog follow-up question is answered at most once
    const pendingInquiry = session.pendingInquiry;
    session.pendingInquiry = undefined;

    const spanClassify = startSpan(trace, 'classifier.classify');
    let intent: IntentResult;
    try {
      intent = await this.classifier.classify({ history: this.recentHistory(session), text });
      endSpan(spanClassify);
    } catch (err) {
      endSpan(spanClassify, 'error');
      return { responseText: this.adapterFailed('classifier', err, log), ended: false };
    }

    message.intent = intent.label;
    intentsClassified.inc({ label: intent.label });
    log.debug({ intent }, 'Intent classified');

    // Answer to the catalog follow-up: "bags" after "what categories do you have?"
    if (pendingInquiry !== undefined && (!intent.detected || intent.label === 'product_inquiry')) {
      const query = `${pendingInquiry} ${text}`;
      return { responseText: await this.inquire(session, query, trace, log, true), ended: false };
    }

    if (!intent.detected) {
      session.escalationOfferPending = true;
      return { responseText: REPLIES.notUnderstood, ended: false };
    }

    const target = stateMachine.resolveTargetMode(session.mode, intent.label);
    if (target === 'Escalating') {
      const result = this.coordinator.begin(session, text, intent.label);
      return { responseText: result.responseText, ended: false };
    }
    if (target === 'Inquiry') {
      return { responseText: await this.inquire(session, text, trace, log), ended: false };
    }
    if (intent.label === 'general_question') {
      return { responseText: await this.answer(text, trace, log), ended: false };
    }
    return { responseText: REPLIES.moreHelp, ended: false };
  }

  /**
   * Single-shot catalog lookup: Idle -> Inquiry -> Idle within the turn.
   * A query that already answers a follow-up never asks another one.
   */
  private async inquire(
    session: SessionRecord,
    query: string,
    trace: TraceContext,
    log: Logger,
    isFollowUp = false,
  ): Promise<string> {
    session.mode = stateMachine.transition(session.sessionId, session.mode, 'Inquiry', 'product_inquiry').newMode;

    const span = startSpan(trace, 'catalog.lookup');
    let result: CatalogResult;
    try {
      result = await this.catalog.lookup(query);
      endSpan(span);
    } catch (err) {
      endSpan(span, 'error');
      return this.adapterFailed('catalog', err, log);
    } finally {
      session.mode = stateMachine.transition(session.sessionId, session.mode, 'Idle', 'inquiry_finished').newMode;
    }

    if (result.needsFollowUp && result.followUpPrompt && !isFollowUp) {
      session.pendingInquiry = query;
      return result.followUpPrompt;
    }
    if (result.found && result.items.length > 0) {
      return catalogItemsReply(result.items);
    }
    return REPLIES.catalogNotFound;
  }

  private async answer(query: string, trace: TraceContext, log: Logger): Promise<string> {
    const span = startSpan(trace, 'knowledge.lookup');
    try {
      const result = await this.knowledge.lookup(query);
      endSpan(span);
      return result.found && result.answerText ? result.answerText : REPLIES.knowledgeFallback;
    } catch (err) {
      endSpan(span, 'error');
      return this.adapterFailed('knowledge', err, log);
    }
  }

  private adapterFailed(adapter: AdapterName, err: unknown, log: Logger): string {
    adapterFailures.inc({ adapter });
    if (err instanceof AdapterUnavailableError) {
      log.warn({ adapter, reason: err.message }, 'Adapter unavailable; answering with retry notice');
    } else {
      log.error({ err, adapter }, 'Adapter call failed unexpectedly');
    }
    return REPLIES.unavailable;
  }

  /** Message texts before the current one, oldest first */
  private recentHistory(session: SessionRecord): string[] {
    if (this.historyWindow <= 0) return [];
    return session.messages
      .slice(0, -1)
      .slice(-this.historyWindow)
      .map((m) => m.text);
  }

  /** The not-understood message that led to the escalation offer */
  private offerQuery(session: SessionRecord): string {
    for (let i = session.messages.length - 2; i >= 0; i--) {
      const m = session.messages[i];
      if (m.role === 'user' && m.intent === 'undetected') return m.text;
    }
    return '';
  }

  private createSession(sessionId: string, log: Logger): SessionRecord {
    const now = this.now();
    log.info('New session started');
    return {
      sessionId,
      mode: 'Idle',
      messages: [],
      escalationOfferPending: false,
      createdAt: now,
      lastActivityAt: now,
    };
  }

  private throwIfAborted(sessionId: string, signal?: AbortSignal): void {
    if (signal?.aborted) {
      throw new TurnAbortedError(sessionId);
    }
  }
}

function toPersistenceError(sessionId: string, message: string, err: unknown): PersistenceError {
  return err instanceof PersistenceError ? err : new PersistenceError(sessionId, message, { cause: err });
}
