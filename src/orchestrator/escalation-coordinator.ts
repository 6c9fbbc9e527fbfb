import { EscalationRecord, SessionRecord } from '../config/types';
import { stateMachine } from './state-machine';
import { isEmailShaped } from './text-signals';
import { REPLIES, askEmail, handoffConfirmation } from './replies';
import { logger } from '../observability/logger';
import { handoffs } from '../observability/metrics';

export interface EscalationStep {
  responseText: string;
  handedOff: boolean;
}

/**
 * Collects name, then email, before handing a session to a human operator.
 *
 * Works on the engine's working copy of the session; nothing here touches
 * the store.
 */
export class EscalationCoordinator {
  constructor(private readonly now: () => number = Date.now) {}

  /**
   * Open the escalation record and move the session to `Escalating`.
   * `query` is the user text that asked for a human.
   */
  begin(session: SessionRecord, query: string, reason: string): EscalationStep {
    const { newMode } = stateMachine.transition(session.sessionId, session.mode, 'Escalating', reason);
    session.mode = newMode;
    session.escalationOfferPending = false;
    session.pendingInquiry = undefined;

    if (!session.escalation) {
      session.escalation = {
        status: 'collecting',
        name: null,
        email: null,
        query: query.trim(),
        inquiryId: null,
        createdAt: this.now(),
        handedOffAt: null,
      };
    }
    return { responseText: REPLIES.askName, handedOff: false };
  }

  /**
   * Take the next answer while the session is `Escalating`.
   */
  advance(session: SessionRecord, userText: string): EscalationStep {
    const record = session.escalation ?? this.recover(session, userText);
    const answer = userText.trim();

    if (record.name === null) {
      if (!answer) {
        return { responseText: REPLIES.askNameAgain, handedOff: false };
      }
      record.name = answer;
      return { responseText: askEmail(answer), handedOff: false };
    }

    if (!isEmailShaped(answer)) {
      return { responseText: REPLIES.askEmailAgain, handedOff: false };
    }

    const timestamp = this.now();
    record.email = answer;
    record.status = 'handed_off';
    record.handedOffAt = timestamp;
    record.inquiryId = inquiryIdFor(session.sessionId, timestamp);
    session.contact = { name: record.name, email: answer };

    const { newMode } = stateMachine.transition(session.sessionId, session.mode, 'HumanHandoff', 'contact_collected');
    session.mode = newMode;

    handoffs.inc();
    logger.info(
      { sessionId: session.sessionId, inquiryId: record.inquiryId, queryLength: record.query.length },
      'Inquiry registered for human follow-up',
    );

    return {
      responseText: handoffConfirmation(record.name, answer, record.inquiryId, session.sessionId),
      handedOff: true,
    };
  }

  /** A session stored as `Escalating` without its record: start collecting again */
  private recover(session: SessionRecord, userText: string): EscalationRecord {
    logger.warn({ sessionId: session.sessionId }, 'Escalating session has no escalation record; recreating it');
    const record: EscalationRecord = {
      status: 'collecting',
      name: null,
      email: null,
      query: userText.trim(),
      inquiryId: null,
      createdAt: this.now(),
      handedOffAt: null,
    };
    session.escalation = record;
    return record;
  }
}

/** INQ-<unix seconds>-<first six characters of the session id> */
export function inquiryIdFor(sessionId: string, timestamp: number): string {
  const suffix = sessionId.replace(/[^a-zA-Z0-9]/g, '').slice(0, 6).toUpperCase();
  return `INQ-${Math.floor(timestamp / 1000)}-${suffix}`;
}
