import { FastifyInstance } from 'fastify';
import { ConversationEngine } from '../orchestrator/conversation-engine';
import { PersistenceError, ValidationError } from '../orchestrator/errors';
import { logger } from '../observability/logger';

/** POST /chat */
interface ChatBody {
  message?: unknown;
  session_id?: unknown;
}

interface SessionParams {
  sessionId: string;
}

/**
 * Register the chat endpoints. The routes only translate HTTP to engine
 * calls; every rule about sessions lives in the engine.
 */
export function registerChatRoutes(app: FastifyInstance, engine: ConversationEngine): void {
  const log = logger.child({ component: 'chat-routes' });

  // ─────────────────────────────────────────────
  // POST /chat: Send one message
  // ─────────────────────────────────────────────
  app.post<{ Body: ChatBody | undefined }>('/chat', async (req, reply) => {
    const body: ChatBody = req.body ?? {};
    const message = typeof body.message === 'string' ? body.message : '';
    const sessionId = typeof body.session_id === 'string' && body.session_id ? body.session_id : undefined;

    try {
      const result = await engine.handleTurn(sessionId, message, { requestId: req.id });
      return reply.status(200).send({
        response: result.responseText,
        continue: result.continue,
        session_id: result.sessionId,
        mode: result.session.mode,
      });
    } catch (err) {
      if (err instanceof ValidationError) {
        return reply.status(400).send({ error: err.message });
      }
      if (err instanceof PersistenceError) {
        log.error({ err, sessionId: err.sessionId }, 'Chat turn could not be recorded');
        return reply.status(500).send({ error: 'Something went wrong. Please try again.' });
      }
      log.error({ err }, 'Chat turn failed');
      return reply.status(500).send({ error: 'Internal error' });
    }
  });

  // ─────────────────────────────────────────────
  // GET /chat/:sessionId: Session snapshot
  // ─────────────────────────────────────────────
  app.get<{ Params: SessionParams }>('/chat/:sessionId', async (req, reply) => {
    const { sessionId } = req.params;

    try {
      const session = await engine.getSession(sessionId);
      if (!session) {
        return reply.status(404).send({ error: 'Session not found' });
      }
      return reply.status(200).send({
        session_id: session.sessionId,
        mode: session.mode,
        created_at: new Date(session.createdAt).toISOString(),
        last_activity_at: new Date(session.lastActivityAt).toISOString(),
        closed_at: session.closedAt ? new Date(session.closedAt).toISOString() : null,
        message_count: session.messages.length,
        contact: session.contact ?? null,
        escalation: session.escalation
          ? {
              status: session.escalation.status,
              inquiry_id: session.escalation.inquiryId,
              query: session.escalation.query,
              handed_off_at: session.escalation.handedOffAt
                ? new Date(session.escalation.handedOffAt).toISOString()
                : null,
            }
          : null,
      });
    } catch (err) {
      log.error({ err, sessionId }, 'Failed to load session');
      return reply.status(500).send({ error: 'Internal error' });
    }
  });

  // ─────────────────────────────────────────────
  // GET /chat/:sessionId/messages: Full transcript
  // ─────────────────────────────────────────────
  app.get<{ Params: SessionParams }>('/chat/:sessionId/messages', async (req, reply) => {
    const { sessionId } = req.params;

    try {
      const session = await engine.getSession(sessionId);
      if (!session) {
        return reply.status(404).send({ error: 'Session not found' });
      }
      return reply.status(200).send({
        session_id: session.sessionId,
        messages: session.messages.map((m) => ({
          role: m.role,
          text: m.text,
          intent: m.intent ?? null,
          timestamp: new Date(m.timestamp).toISOString(),
        })),
      });
    } catch (err) {
      log.error({ err, sessionId }, 'Failed to load transcript');
      return reply.status(500).send({ error: 'Internal error' });
    }
  });
}
