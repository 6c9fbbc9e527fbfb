import OpenAI from 'openai';
import { IntentResult } from '../config/types';
import { ClassificationRequest, IntentClassifier } from './types';
import { CLASSIFIER_OUTPUT_SCHEMA, parseClassifierOutput } from './classifier-contract';
import { AdapterUnavailableError } from '../orchestrator/errors';
import { logger } from '../observability/logger';

const MAX_RETRIES = 1;

export interface OpenAIClassifierConfig {
  apiKey: string;
  model: string;
  temperature: number;
  timeoutMs: number;
}

const SYSTEM_PROMPT = [
  'You classify messages sent to the assistant of a retail store.',
  'Pick exactly one label for the LAST user message, using the earlier messages only as context:',
  '- product_inquiry: products, stock, prices, categories',
  '- general_question: the store itself (hours, location, contact, payment methods, promotions, social media)',
  '- human_request: the user wants to talk to a person or leave an inquiry for the staff',
  '- other: greetings, thanks, small talk',
  '- undetected: the message cannot be understood',
  'Set "detected" to false only for undetected.',
  'Respond with a JSON object matching this schema:',
  JSON.stringify(CLASSIFIER_OUTPUT_SCHEMA),
].join('\n');

/**
 * Intent classifier backed by an OpenAI chat model in JSON mode.
 */
export class OpenAIIntentClassifier implements IntentClassifier {
  readonly name = 'openai';
  private client: OpenAI;
  private model: string;
  private temperature: number;
  private log = logger.child({ component: 'openai-classifier' });

  constructor(config: OpenAIClassifierConfig, client?: OpenAI) {
    this.model = config.model;
    this.temperature = config.temperature;
    this.client = client ?? new OpenAI({
      apiKey: config.apiKey,
      timeout: config.timeoutMs,
      maxRetries: MAX_RETRIES,
    });
  }

  async classify(request: ClassificationRequest): Promise<IntentResult> {
    const start = Date.now();
    const context = request.history.length > 0
      ? `Conversation so far:\n${request.history.map((line) => `- ${line}`).join('\n')}\n\n`
      : '';

    let content: string | null | undefined;
    try {
      const completion = await this.client.chat.completions.create({
        model: this.model,
        temperature: this.temperature,
        response_format: { type: 'json_object' as const },
        messages: [
          { role: 'system', content: SYSTEM_PROMPT },
          { role: 'user', content: `${context}Last user message: ${request.text}` },
        ],
      });
      content = completion.choices[0]?.message?.content;
    } catch (err) {
      this.log.error({ err, latencyMs: Date.now() - start }, 'Intent classification request failed');
      throw new AdapterUnavailableError('classifier', 'Intent classifier is unavailable', { cause: err });
    }

    if (!content) {
      throw new AdapterUnavailableError('classifier', 'Intent classifier returned an empty response');
    }

    const result = parseClassifierOutput(content);
    this.log.debug({ label: result.label, latencyMs: Date.now() - start }, 'Intent classified');
    return result;
  }
}
