/**
 * Chat API Routes
 *
 * Direct prompts to the responder, and room messages through the chat bot.
 */

import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { ServiceContainer } from '../../services';
import { apiResponse } from '../middleware/response';
import { parseBody } from '../middleware/validate';

const chatSchema = z.object({
  prompt: z.string().min(1).max(4000),
});

const roomMessageSchema = z.object({
  senderId: z.string().min(1),
  text: z.string().min(1).max(4000),
});

export function createChatRouter(services: ServiceContainer): Router {
  const router = Router();

  /**
   * POST /api/v1/chat
   * Get a response to a prompt
   */
  router.post('/', (req: Request, res: Response) => {
    const { prompt } = parseBody(chatSchema, req.body);

    const decision = services.responder.respond(prompt);

    res.json(apiResponse({
      ...decision,
      sessionId: services.responder.sessionId,
    }));
  });

  return router;
}

export function createRoomsRouter(services: ServiceContainer): Router {
  const router = Router();

  /**
   * POST /api/v1/rooms/:roomId/messages
   * Deliver a room message to the chat bot; reply is null when the bot stays silent
   */
  router.post('/:roomId/messages', (req: Request, res: Response) => {
    const { senderId, text } = parseBody(roomMessageSchema, req.body);
    const { roomId } = req.params;

    const reply = services.chatBot.processMessage(text, senderId, roomId);

    res.json(apiResponse({
      roomId,
      reply,
      context: services.chatBot.getRoomContext(roomId),
    }));
  });

  return router;
}
