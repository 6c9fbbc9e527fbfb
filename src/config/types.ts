/** Conversation modes */
export type SessionMode = 'Idle' | 'Inquiry' | 'Escalating' | 'HumanHandoff' | 'Closed';

export const SESSION_MODES: readonly SessionMode[] = ['Idle', 'Inquiry', 'Escalating', 'HumanHandoff', 'Closed'];

/** Closed set of classifier labels */
export type IntentLabel = 'product_inquiry' | 'general_question' | 'human_request' | 'other' | 'undetected';

export const INTENT_LABELS: readonly IntentLabel[] = [
  'product_inquiry',
  'general_question',
  'human_request',
  'other',
  'undetected',
];

export interface IntentResult {
  label: IntentLabel;
  detected: boolean;
}

export type MessageRole = 'user' | 'assistant' | 'system';

/** A single entry of the session transcript. Never mutated after it is appended. */
export interface SessionMessage {
  role: MessageRole;
  text: string;
  timestamp: number;
  /** Set on user messages that went through classification */
  intent?: IntentLabel;
}

export type EscalationStatus = 'collecting' | 'handed_off';

export interface EscalationRecord {
  status: EscalationStatus;
  name: string | null;
  email: string | null;
  /** The user text that triggered the escalation */
  query: string;
  /** Reference handed to the customer, assigned at hand-off */
  inquiryId: string | null;
  createdAt: number;
  handedOffAt: number | null;
}

export interface ContactInfo {
  name: string;
  email: string;
}

export interface SessionRecord {
  sessionId: string;
  mode: SessionMode;
  messages: SessionMessage[];
  escalation?: EscalationRecord;
  /** Present only once both name and email were captured */
  contact?: ContactInfo;
  /** The previous reply offered a human hand-off and awaits a yes/no */
  escalationOfferPending: boolean;
  /** Catalog query waiting for the user's follow-up answer */
  pendingInquiry?: string;
  createdAt: number;
  lastActivityAt: number;
  closedAt?: number;
}
