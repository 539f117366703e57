import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { ServiceContainer } from '../../services';
import { apiResponse } from '../middleware/response';
import { parseBody } from '../middleware/validate';

const generateSchema = z.object({
  language: z.string().trim().min(1).max(40),
  task: z.string().min(1).max(4000),
});

export function createCodeRouter(services: ServiceContainer): Router {
  const router = Router();

  /**
   * POST /api/v1/code
   * Skeleton code for a task; 403 when code generation is switched off
   */
  router.post('/', (req: Request, res: Response) => {
    const { language, task } = parseBody(generateSchema, req.body);

    res.json(apiResponse({
      language,
      task,
      code: services.responder.generateCode(language, task),
    }));
  });

  return router;
}
