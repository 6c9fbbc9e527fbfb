import { IntentLabel, SessionMode } from '../config/types';
import { MODE_TRANSITIONS, ModeTransitionEvent } from './types';
import { logger } from '../observability/logger';
import { modeTransitions } from '../observability/metrics';

export class StateMachine {
  /**
   * Attempt a mode transition. Returns the new mode if valid, or the current mode if not.
   */
  transition(
    sessionId: string,
    currentMode: SessionMode,
    targetMode: SessionMode,
    reason: string,
  ): { newMode: SessionMode; event: ModeTransitionEvent | null } {
    if (currentMode === targetMode) {
      return { newMode: currentMode, event: null };
    }

    const allowed = MODE_TRANSITIONS[currentMode];
    if (!allowed.includes(targetMode)) {
      logger.warn(
        { sessionId, from: currentMode, to: targetMode, reason },
        'Invalid mode transition attempted',
      );
      return { newMode: currentMode, event: null };
    }

    const event: ModeTransitionEvent = {
      sessionId,
      from: currentMode,
      to: targetMode,
      reason,
      timestamp: Date.now(),
    };

    modeTransitions.inc({ from: currentMode, to: targetMode });
    logger.info(event, 'Mode transition');

    return { newMode: targetMode, event };
  }

  /**
   * Mode a classified turn moves to from `Idle`.
   */
  resolveTargetMode(currentMode: SessionMode, intent: IntentLabel): SessionMode {
    switch (intent) {
      case 'human_request':
        return 'Escalating';
      case 'product_inquiry':
        return 'Inquiry';
      case 'general_question':
      case 'other':
      case 'undetected':
      default:
        return currentMode;
    }
  }

  isTerminal(mode: SessionMode): boolean {
    return MODE_TRANSITIONS[mode].length === 0;
  }
}

export const stateMachine = new StateMachine();
