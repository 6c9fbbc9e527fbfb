import { IntentClassifier } from './types';
import { OpenAIIntentClassifier } from './openai-classifier';
import { KeywordIntentClassifier } from './keyword-classifier';
import { logger } from '../observability/logger';

export interface ClassifierEnvConfig {
  /** 'openai', 'keyword', or 'auto' (OpenAI when a key is set) */
  provider: string;
  openaiApiKey: string;
  model: string;
  temperature: number;
  timeoutMs: number;
}

/**
 * Build the intent classifier from environment configuration.
 */
export function createClassifier(config: ClassifierEnvConfig): IntentClassifier {
  const log = logger.child({ component: 'classifier-factory' });

  switch (config.provider) {
    case 'openai':
      if (!config.openaiApiKey) {
        throw new Error('CLASSIFIER_PROVIDER=openai requires OPENAI_API_KEY');
      }
      break;
    case 'keyword':
      log.info('Keyword intent classifier initialized');
      return new KeywordIntentClassifier();
    case 'auto':
      if (!config.openaiApiKey) {
        log.warn('No OPENAI_API_KEY set; using keyword intent classifier');
        return new KeywordIntentClassifier();
      }
      break;
    default:
      throw new Error(`Unknown classifier provider: ${config.provider}`);
  }

  log.info({ model: config.model }, 'OpenAI intent classifier initialized');
  return new OpenAIIntentClassifier({
    apiKey: config.openaiApiKey,
    model: config.model,
    temperature: config.temperature,
    timeoutMs: config.timeoutMs,
  });
}
