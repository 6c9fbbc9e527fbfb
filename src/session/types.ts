import { SessionRecord } from '../config/types';

/**
 * Durable session storage. `save` writes the whole record in one operation;
 * implementations throw PersistenceError when the backend fails.
 */
export interface SessionStore {
  get(sessionId: string): Promise<SessionRecord | null>;
  save(record: SessionRecord): Promise<void>;
}
