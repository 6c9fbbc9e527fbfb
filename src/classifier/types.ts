import { IntentResult } from '../config/types';

export interface ClassificationRequest {
  /** Recent message texts, oldest first */
  history: string[];
  text: string;
}

/**
 * Intent classification capability. Throws AdapterUnavailableError when the
 * backing model cannot be reached.
 */
export interface IntentClassifier {
  readonly name: string;
  classify(request: ClassificationRequest): Promise<IntentResult>;
}
