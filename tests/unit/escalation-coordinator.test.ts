import { EscalationCoordinator, inquiryIdFor } from '../../src/orchestrator/escalation-coordinator';
import { REPLIES } from '../../src/orchestrator/replies';
import { SessionRecord } from '../../src/config/types';

const NOW = 1_700_000_000_000;

function makeSession(overrides: Partial<SessionRecord> = {}): SessionRecord {
  return {
    sessionId: 'abc-123-def',
    mode: 'Idle',
    messages: [],
    escalationOfferPending: false,
    createdAt: NOW,
    lastActivityAt: NOW,
    ...overrides,
  };
}

describe('EscalationCoordinator', () => {
  let coordinator: EscalationCoordinator;

  beforeEach(() => {
    coordinator = new EscalationCoordinator(() => NOW);
  });

  describe('begin', () => {
    it('should move to Escalating, open a record and ask for the name', () => {
      const session = makeSession({ escalationOfferPending: true, pendingInquiry: 'bags' });
      const step = coordinator.begin(session, '  I want to talk to a person ', 'human_request');

      expect(step).toEqual({ responseText: REPLIES.askName, handedOff: false });
      expect(session.mode).toBe('Escalating');
      expect(session.escalationOfferPending).toBe(false);
      expect(session.pendingInquiry).toBeUndefined();
      expect(session.escalation).toEqual({
        status: 'collecting',
        name: null,
        email: null,
        query: 'I want to talk to a person',
        inquiryId: null,
        createdAt: NOW,
        handedOffAt: null,
      });
    });
  });

  describe('advance', () => {
    it('should take the name first, then ask for the email', () => {
      const session = makeSession();
      coordinator.begin(session, 'help', 'human_request');

      const step = coordinator.advance(session, ' Maria ');

      expect(step).toEqual({
        responseText: 'Thanks, Maria! What email address can our team reach you at?',
        handedOff: false,
      });
      expect(session.escalation?.name).toBe('Maria');
      expect(session.mode).toBe('Escalating');
    });

    it('should ask again for an empty name', () => {
      const session = makeSession();
      coordinator.begin(session, 'help', 'human_request');

      expect(coordinator.advance(session, '   ').responseText).toBe(REPLIES.askNameAgain);
      expect(session.escalation?.name).toBeNull();
    });

    it('should re-ask for an invalid email without changing anything', () => {
      const session = makeSession();
      coordinator.begin(session, 'help', 'human_request');
      coordinator.advance(session, 'Maria');
      const before = structuredClone(session);

      const step = coordinator.advance(session, 'not-an-email');

      expect(step).toEqual({ responseText: REPLIES.askEmailAgain, handedOff: false });
      expect(session).toEqual(before);
    });

    it('should hand off once a valid email arrives', () => {
      const session = makeSession();
      coordinator.begin(session, 'help', 'human_request');
      coordinator.advance(session, 'Maria');

      const step = coordinator.advance(session, 'maria@example.com');

      expect(step.handedOff).toBe(true);
      expect(step.responseText).toBe(
        'Thank you, Maria! Your inquiry has been registered (ID: INQ-1700000000-ABC123). ' +
          'A member of our team will contact you at maria@example.com within 24-48 hours. ' +
          'Your session reference is abc-123-def.',
      );
      expect(session.mode).toBe('HumanHandoff');
      expect(session.contact).toEqual({ name: 'Maria', email: 'maria@example.com' });
      expect(session.escalation).toMatchObject({
        status: 'handed_off',
        email: 'maria@example.com',
        inquiryId: 'INQ-1700000000-ABC123',
        handedOffAt: NOW,
      });
    });

    it('should recreate a missing record and treat the text as the name', () => {
      const session = makeSession({ mode: 'Escalating' });

      const step = coordinator.advance(session, 'Maria');

      expect(step.responseText).toBe('Thanks, Maria! What email address can our team reach you at?');
      expect(session.escalation).toMatchObject({ status: 'collecting', name: 'Maria', query: 'Maria' });
    });
  });

  describe('inquiryIdFor', () => {
    it('should combine unix seconds with the start of the session id', () => {
      expect(inquiryIdFor('f3b2a1c9-0000-4000-8000-000000000000', 1_712_345_678_999)).toBe('INQ-1712345678-F3B2A1');
    });
  });
});
