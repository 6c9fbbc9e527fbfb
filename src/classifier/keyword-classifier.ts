import { IntentLabel, IntentResult } from '../config/types';
import { ClassificationRequest, IntentClassifier } from './types';
import { UNDETECTED } from './classifier-contract';

interface KeywordRule {
  label: Exclude<IntentLabel, 'undetected'>;
  patterns: RegExp[];
}

/** Evaluated in order; the first matching rule wins */
const RULES: KeywordRule[] = [
  {
    label: 'human_request',
    patterns: [
      /\b(human|person|operator|agent|representative|staff member|someone)\b/,
      /\b(talk|speak|chat) (to|with)\b/,
      /\bcontact me\b/,
    ],
  },
  {
    label: 'product_inquiry',
    patterns: [
      /\b(products?|items?|stock|price|prices|cost|costs|buy|sell|categor(y|ies)|catalog(ue)?|available)\b/,
      /\bdo you (have|sell|carry)\b/,
      /\bhow much\b/,
    ],
  },
  {
    label: 'general_question',
    patterns: [
      /\b(hours?|open|opening|close|closing|schedule)\b/,
      /\b(where|location|address|located|directions)\b/,
      /\b(phone|contact|website|e-?mail)\b/,
      /\b(pay|payment|card|cash|paypal)\b/,
      /\b(promotions?|promo|discounts?|sale|offers?|deals?)\b/,
      /\b(facebook|instagram|tiktok|social)\b/,
    ],
  },
  {
    label: 'other',
    patterns: [
      /\b(hi|hello|hey|thanks|thank you|good (morning|afternoon|evening)|ok|okay|cool|great)\b/,
    ],
  },
];

/**
 * Offline classifier for local development and tests: plain keyword rules,
 * no model. Only the new text is considered.
 */
export class KeywordIntentClassifier implements IntentClassifier {
  readonly name = 'keyword';

  async classify(request: ClassificationRequest): Promise<IntentResult> {
    const text = request.text.toLowerCase();
    for (const rule of RULES) {
      if (rule.patterns.some((pattern) => pattern.test(text))) {
        return { label: rule.label, detected: true };
      }
    }
    return UNDETECTED;
  }
}
