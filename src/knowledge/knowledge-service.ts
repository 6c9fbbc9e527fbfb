import * as fs from 'fs';
import * as path from 'path';
import yaml from 'js-yaml';
import { KnowledgeAdapter, KnowledgeResult, KnowledgeTopic, Promotion, StoreKnowledge } from './types';
import { AdapterUnavailableError } from '../orchestrator/errors';
import { logger } from '../observability/logger';

const PROMOTIONS_TOPIC = 'promotions';

const PROMOTION_KEYWORDS = ['promotion', 'promotions', 'promo', 'promos', 'discount', 'discounts', 'sale', 'sales', 'offer', 'offers', 'deal', 'deals', 'coupon'];

function asString(value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  if (value instanceof Date) return value.toISOString().slice(0, 10);
  return undefined;
}

/** Validate the parsed YAML document into StoreKnowledge, dropping malformed entries */
export function parseStoreKnowledge(doc: unknown): StoreKnowledge {
  const root = typeof doc === 'object' && doc !== null ? (doc as Record<string, unknown>) : {};
  const store = typeof root.store === 'object' && root.store !== null ? (root.store as Record<string, unknown>) : root;

  const topics: KnowledgeTopic[] = [];
  for (const raw of Array.isArray(store.topics) ? store.topics : []) {
    const entry = typeof raw === 'object' && raw !== null ? (raw as Record<string, unknown>) : {};
    const topic = asString(entry.topic);
    const answer = asString(entry.answer);
    const keywords = Array.isArray(entry.keywords) ? entry.keywords.filter((k): k is string => typeof k === 'string') : [];
    if (topic && answer && keywords.length > 0) {
      topics.push({ topic, answer: answer.trim(), keywords: keywords.map((k) => k.toLowerCase()) });
    }
  }

  const promotions: Promotion[] = [];
  for (const raw of Array.isArray(store.promotions) ? store.promotions : []) {
    const entry = typeof raw === 'object' && raw !== null ? (raw as Record<string, unknown>) : {};
    const title = asString(entry.title);
    const validUntil = asString(entry.valid_until);
    if (title && validUntil) promotions.push({ title, validUntil });
  }

  return { topics, promotions };
}

/**
 * Keyword lookup over the local store facts (hours, location, contact, ...).
 * A query matches the topic sharing the most keywords with it.
 */
export class KnowledgeService implements KnowledgeAdapter {
  private knowledge: StoreKnowledge | null;

  constructor(knowledge: StoreKnowledge | null, private readonly clock: () => Date = () => new Date()) {
    this.knowledge = knowledge;
  }

  static fromDirectory(dir: string): KnowledgeService {
    const filepath = path.join(dir, 'store.yaml');
    if (!fs.existsSync(filepath)) {
      logger.warn({ filepath }, 'Knowledge file not found');
      return new KnowledgeService(null);
    }
    try {
      const knowledge = parseStoreKnowledge(yaml.load(fs.readFileSync(filepath, 'utf-8')));
      logger.info(
        { topicCount: knowledge.topics.length, promotionCount: knowledge.promotions.length },
        'Knowledge base loaded',
      );
      return new KnowledgeService(knowledge);
    } catch (err) {
      logger.error({ err, filepath }, 'Failed to load knowledge file');
      return new KnowledgeService(null);
    }
  }

  get topics(): string[] {
    return this.knowledge?.topics.map((t) => t.topic) ?? [];
  }

  async lookup(query: string): Promise<KnowledgeResult> {
    if (!this.knowledge) {
      throw new AdapterUnavailableError('knowledge', 'Knowledge base is not loaded');
    }

    const terms = new Set(
      query
        .toLowerCase()
        .replace(/[^a-z0-9\s-]/g, ' ')
        .split(/\s+/)
        .filter(Boolean),
    );

    let best: { topic: KnowledgeTopic; score: number } | null = null;
    for (const topic of this.knowledge.topics) {
      const score = topic.keywords.filter((k) => (k.includes(' ') ? query.toLowerCase().includes(k) : terms.has(k))).length;
      if (score > 0 && (!best || score > best.score)) best = { topic, score };
    }

    const promotionScore = PROMOTION_KEYWORDS.filter((k) => terms.has(k)).length;
    if (promotionScore > 0 && (!best || promotionScore > best.score)) {
      return { found: true, topic: PROMOTIONS_TOPIC, answerText: this.describePromotions(this.knowledge.promotions) };
    }

    if (!best) {
      return { found: false, answerText: '' };
    }
    return { found: true, topic: best.topic.topic, answerText: best.topic.answer };
  }

  private describePromotions(promotions: Promotion[]): string {
    const today = this.clock().toISOString().slice(0, 10);
    const active = promotions.filter((p) => p.validUntil >= today);
    if (active.length === 0) {
      return 'There are no active promotions right now.';
    }
    return ['Current promotions:', ...active.map((p) => `- ${p.title} (until ${p.validUntil})`)].join('\n');
  }
}
