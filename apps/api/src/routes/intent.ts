import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { z } from 'zod';
import type { AppServices } from '../services/container';
import { searchFromIntent, type IntentSearchOutcome } from '../services/intent/search';
import { sourceListSchema } from './schemas';
import { streamOperation } from './sse';

const createSessionSchema = z.object({
  maxQuestions: z.number().int().min(1).max(10).optional(),
  sources: sourceListSchema.optional(),
});

const messageSchema = z.object({
  message: z.string().max(4000).optional(),
});

export function createIntentRoutes(services: AppServices) {
  const intent = new Hono();

  /**
   * POST /api/intent/sessions
   * Start an interview session
   */
  intent.post('/sessions', zValidator('json', createSessionSchema), (c) => {
    const session = services.sessions.create(c.req.valid('json'));
    return c.json({ sessionId: session.id, sources: session.sources }, 201);
  });

  /**
   * GET /api/intent/sessions/:id
   * Profile and transcript collected so far
   */
  intent.get('/sessions/:id', (c) => {
    const { id, collector } = services.sessions.get(c.req.param('id'));
    return c.json({
      sessionId: id,
      ready: collector.isReady,
      turns: collector.turns,
      profile: collector.getProfile(),
      transcript: collector.getTranscript(),
    });
  });

  /**
   * POST /api/intent/sessions/:id/messages
   * One interview turn; an empty body asks for the opening question
   */
  intent.post('/sessions/:id/messages', zValidator('json', messageSchema), async (c) => {
    const session = services.sessions.get(c.req.param('id'));
    const { message } = c.req.valid('json');
    const turn = await session.collector.ask(message ?? '');
    return c.json(turn);
  });

  /**
   * POST /api/intent/sessions/:id/search
   * Build the strategy and run the aggregated search (SSE)
   */
  intent.post('/sessions/:id/search', (c) => {
    const session = services.sessions.get(c.req.param('id'));
    return streamOperation<{ message: string }, IntentSearchOutcome>(c, 'IntentSearch', (emit, signal) =>
      searchFromIntent(session.collector, services.aggregator, {
        signal,
        onProgress: (message) => emit({ message }),
      })
    );
  });

  /**
   * POST /api/intent/sessions/:id/reset
   * Forget the profile and transcript, keep the session
   */
  intent.post('/sessions/:id/reset', (c) => {
    const session = services.sessions.reset(c.req.param('id'));
    return c.json({ sessionId: session.id, reset: true });
  });

  /**
   * DELETE /api/intent/sessions/:id
   */
  intent.delete('/sessions/:id', (c) => {
    services.sessions.delete(c.req.param('id'));
    return c.json({ success: true });
  });

  return intent;
}
