import { Router, Request, Response } from 'express';
import { ServiceContainer } from '../../services';
import { apiResponse } from '../middleware/response';

export function createSessionRouter(services: ServiceContainer): Router {
  const router = Router();

  /**
   * GET /api/v1/session
   * Session statistics and personality
   */
  router.get('/', (req: Request, res: Response) => {
    const personality = services.responder.getPersonalityInfo();

    res.json(apiResponse({
      ...services.responder.getSessionStats(),
      traits: personality.traits,
      activeEmotions: services.tracker.getActiveEmotions(),
    }));
  });

  return router;
}
