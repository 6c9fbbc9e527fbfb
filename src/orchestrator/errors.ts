export type EngineErrorCode =
  | 'validation_error'
  | 'adapter_unavailable'
  | 'persistence_error'
  | 'turn_aborted';

export class EngineError extends Error {
  readonly code: EngineErrorCode;

  constructor(code: EngineErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'EngineError';
    this.code = code;
  }
}

/** Rejected input. Nothing was read or written. */
export class ValidationError extends EngineError {
  constructor(message: string) {
    super('validation_error', message);
    this.name = 'ValidationError';
  }
}

export type AdapterName = 'classifier' | 'catalog' | 'knowledge';

/** A classifier, catalog or knowledge call failed. */
export class AdapterUnavailableError extends EngineError {
  readonly adapter: AdapterName;

  constructor(adapter: AdapterName, message: string, options?: { cause?: unknown }) {
    super('adapter_unavailable', message, options);
    this.name = 'AdapterUnavailableError';
    this.adapter = adapter;
  }
}

/** The session store could not load or save. The turn did not happen. */
export class PersistenceError extends EngineError {
  readonly sessionId: string;

  constructor(sessionId: string, message: string, options?: { cause?: unknown }) {
    super('persistence_error', message, options);
    this.name = 'PersistenceError';
    this.sessionId = sessionId;
  }
}

/** The caller aborted before the turn was committed. */
export class TurnAbortedError extends EngineError {
  readonly sessionId: string;

  constructor(sessionId: string) {
    super('turn_aborted', `Turn for session ${sessionId} was aborted before commit`);
    this.name = 'TurnAbortedError';
    this.sessionId = sessionId;
  }
}
