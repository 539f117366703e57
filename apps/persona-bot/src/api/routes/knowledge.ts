import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { containsReservedKey, isReservedKey, jsonValueSchema } from '../../knowledge';
import { ServiceContainer } from '../../services';
import { NotFoundError, PersistenceError, ValidationError } from '../../utils/errors';
import { apiResponse } from '../middleware/response';
import { parseBody } from '../middleware/validate';

// Checked on the raw body: parsing into a record would silently drop reserved keys
const putSchema = z
  .object({ value: z.unknown() })
  .refine(({ value }) => !containsReservedKey(value), {
    message: 'Value contains a reserved key',
    path: ['value'],
  })
  .pipe(z.object({ value: jsonValueSchema }));

export function createKnowledgeRouter(services: ServiceContainer): Router {
  const router = Router();

  /**
   * GET /api/v1/knowledge/:key
   */
  router.get('/:key', (req: Request, res: Response) => {
    const { key } = req.params;
    const entry = services.knowledge.getEntry(key);
    if (!entry) {
      throw new NotFoundError('Knowledge entry', key);
    }

    res.json(apiResponse({ key, ...entry }));
  });

  /**
   * PUT /api/v1/knowledge/:key
   * Store a value; 500 when it could not be persisted
   */
  router.put('/:key', (req: Request, res: Response) => {
    const { key } = req.params;
    if (isReservedKey(key)) {
      throw new ValidationError('Invalid knowledge key', { key });
    }
    const { value } = parseBody(putSchema, req.body);

    if (!services.responder.storeKnowledge(key, value)) {
      throw new PersistenceError(`Failed to persist knowledge entry ${key}`);
    }

    res.json(apiResponse({ key, ...services.knowledge.getEntry(key) }));
  });

  return router;
}
