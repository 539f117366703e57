import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { ServiceContainer } from '../../services';
import { apiResponse } from '../middleware/response';
import { parseBody } from '../middleware/validate';

const classifySchema = z.object({
  text: z.string().max(4000),
});

export function createEmotionRouter(services: ServiceContainer): Router {
  const router = Router();

  /**
   * POST /api/v1/emotion/classify
   * Classify text without touching the emotional state
   */
  router.post('/classify', (req: Request, res: Response) => {
    const { text } = parseBody(classifySchema, req.body);

    res.json(apiResponse(services.responder.analyzeEmotion(text)));
  });

  /**
   * GET /api/v1/emotion/state
   * Current emotional state after a decay pass
   */
  router.get('/state', (req: Request, res: Response) => {
    const state = services.tracker.comprehensiveState();

    res.json(apiResponse({
      ...state,
      modifier: services.tracker.modifierText(state.dominant),
    }));
  });

  /**
   * GET /api/v1/emotion/definitions
   */
  router.get('/definitions', (req: Request, res: Response) => {
    const definitions = services.registry.ids().map((id) => services.registry.lookup(id));

    res.json(apiResponse({
      count: definitions.length,
      definitions,
    }));
  });

  return router;
}
