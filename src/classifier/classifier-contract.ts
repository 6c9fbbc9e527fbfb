import Ajv, { JSONSchemaType } from 'ajv';
import { INTENT_LABELS, IntentLabel, IntentResult } from '../config/types';
import { logger } from '../observability/logger';

interface ClassifierOutput {
  label: IntentLabel;
  detected: boolean;
}

/**
 * JSON Schema the model output must match.
 */
export const CLASSIFIER_OUTPUT_SCHEMA: JSONSchemaType<ClassifierOutput> = {
  type: 'object',
  properties: {
    label: { type: 'string', enum: [...INTENT_LABELS] },
    detected: { type: 'boolean' },
  },
  required: ['label', 'detected'],
  additionalProperties: true,
};

const ajv = new Ajv({ allErrors: true });
const validate = ajv.compile(CLASSIFIER_OUTPUT_SCHEMA);

export const UNDETECTED: IntentResult = { label: 'undetected', detected: false };

/**
 * Parse raw model output into an IntentResult.
 * Anything that does not satisfy the contract counts as not understood.
 */
export function parseClassifierOutput(raw: string): IntentResult {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    logger.warn({ rawLength: raw.length }, 'Classifier returned non-JSON output');
    return UNDETECTED;
  }

  if (!validate(parsed)) {
    const errors = validate.errors?.map((e) => `${e.instancePath} ${e.message}`).join('; ');
    logger.warn({ errors }, 'Classifier output failed schema validation');
    return UNDETECTED;
  }

  // The two fields must agree: an undetected label is never "detected"
  if (parsed.label === 'undetected' || !parsed.detected) {
    return UNDETECTED;
  }
  return { label: parsed.label, detected: true };
}
