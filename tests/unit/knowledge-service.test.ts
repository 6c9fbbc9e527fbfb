import * as path from 'path';
import { KnowledgeService, parseStoreKnowledge } from '../../src/knowledge/knowledge-service';
import { AdapterUnavailableError } from '../../src/orchestrator/errors';

const KNOWLEDGE_DIR = path.resolve(__dirname, '../../knowledge');

describe('KnowledgeService', () => {
  const fixedClock = () => new Date('2026-10-18T12:00:00Z');
  let service: KnowledgeService;

  beforeAll(() => {
    service = KnowledgeService.fromDirectory(KNOWLEDGE_DIR);
  });

  it('should load every topic of the shipped store file', () => {
    expect(service.topics).toEqual(['hours', 'location', 'contact', 'payment_methods', 'social_media']);
  });

  it('should answer opening hours', async () => {
    await expect(service.lookup('What are your opening hours?')).resolves.toEqual({
      found: true,
      topic: 'hours',
      answerText: 'Our opening hours:\n- Monday to Friday: 9:00 - 19:00\n- Saturday: 10:00 - 16:00\n- Sunday: closed',
    });
  });

  it('should answer the store location', async () => {
    await expect(service.lookup('Where are you located?')).resolves.toEqual({
      found: true,
      topic: 'location',
      answerText: 'You can find us at 12 Harbour Street, Springfield, United States.',
    });
  });

  it('should answer payment methods', async () => {
    const result = await service.lookup('Do you accept PayPal?');
    expect(result.topic).toBe('payment_methods');
    expect(result.answerText).toBe('We accept cash, credit and debit cards, PayPal and bank transfer.');
  });

  it('should match multi-word keywords', async () => {
    expect((await service.lookup('how do I find you')).topic).toBe('location');
  });

  it('should report unknown questions as not found', async () => {
    await expect(service.lookup('Tell me a joke')).resolves.toEqual({ found: false, answerText: '' });
  });

  describe('promotions', () => {
    const knowledge = parseStoreKnowledge({
      store: {
        topics: [],
        promotions: [
          { title: '10% off all backpacks', valid_until: '2099-12-31' },
          { title: 'Spring clearance', valid_until: '2020-04-30' },
        ],
      },
    });

    it('should list only promotions that are still valid', async () => {
      const promos = new KnowledgeService(knowledge, fixedClock);
      await expect(promos.lookup('Any promotions?')).resolves.toEqual({
        found: true,
        topic: 'promotions',
        answerText: 'Current promotions:\n- 10% off all backpacks (until 2099-12-31)',
      });
    });

    it('should say so when every promotion has expired', async () => {
      const promos = new KnowledgeService(knowledge, () => new Date('2100-01-01T00:00:00Z'));
      expect((await promos.lookup('any discounts')).answerText).toBe('There are no active promotions right now.');
    });
  });

  it('should be unavailable when no knowledge is loaded', async () => {
    const empty = KnowledgeService.fromDirectory(path.join(__dirname, 'no-such-dir'));
    await expect(empty.lookup('hours')).rejects.toBeInstanceOf(AdapterUnavailableError);
  });
});

describe('parseStoreKnowledge', () => {
  it('should accept a document without the store root and YAML dates', () => {
    expect(
      parseStoreKnowledge({
        topics: [
          { topic: 'hours', keywords: ['Hours'], answer: 'Always open.\n' },
          { topic: 'broken', keywords: [] },
        ],
        promotions: [{ title: 'Launch week', valid_until: new Date('2030-01-02T00:00:00Z') }],
      }),
    ).toEqual({
      topics: [{ topic: 'hours', keywords: ['hours'], answer: 'Always open.' }],
      promotions: [{ title: 'Launch week', validUntil: '2030-01-02' }],
    });
  });
});
