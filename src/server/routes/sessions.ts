import { Router } from 'express';
import type { ConversationStore } from '../../storage/conversation-store.js';
import { asyncHandler } from '../middleware/async-handler.js';

export function createSessionsRouter(store: ConversationStore): Router {
  const router = Router();

  router.get(
    '/:id',
    asyncHandler(async (req, res) => {
      const session = await store.get(req.params.id);
      if (!session.createdAt) {
        res.status(404).json({ error: `Session not found: ${req.params.id}` });
        return;
      }

      res.json({
        id: session.id,
        summary: session.summary,
        summarizedThroughSeq: session.summarizedThroughSeq,
        createdAt: session.createdAt,
        updatedAt: session.updatedAt,
        turns: session.turns,
      });
    }),
  );

  return router;
}
