import { SessionMode, SessionRecord } from '../config/types';

/**
 * Allowed mode transitions. `Inquiry` is a working state inside a single
 * turn; `HumanHandoff` and `Closed` are terminal.
 */
export const MODE_TRANSITIONS: Record<SessionMode, readonly SessionMode[]> = {
  Idle: ['Inquiry', 'Escalating', 'Closed'],
  Inquiry: ['Idle', 'Closed'],
  Escalating: ['HumanHandoff', 'Closed'],
  HumanHandoff: [],
  Closed: [],
};

export interface ModeTransitionEvent {
  sessionId: string;
  from: SessionMode;
  to: SessionMode;
  reason: string;
  timestamp: number;
}

export interface TurnOptions {
  /** Aborting before the session is saved discards the whole turn */
  signal?: AbortSignal;
  requestId?: string;
}

export interface TurnResult {
  responseText: string;
  continue: boolean;
  sessionId: string;
  /** Copy of the session as it was saved */
  session: SessionRecord;
}
