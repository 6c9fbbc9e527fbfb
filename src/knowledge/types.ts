export interface KnowledgeTopic {
  topic: string;
  keywords: string[];
  answer: string;
}

export interface Promotion {
  title: string;
  /** ISO date (YYYY-MM-DD), inclusive */
  validUntil: string;
}

export interface StoreKnowledge {
  topics: KnowledgeTopic[];
  promotions: Promotion[];
}

export interface KnowledgeResult {
  found: boolean;
  answerText: string;
  topic?: string;
}

/**
 * Lookup of general store facts. Throws AdapterUnavailableError when the
 * knowledge source cannot be read.
 */
export interface KnowledgeAdapter {
  lookup(query: string): Promise<KnowledgeResult>;
}
