import express, { Request, Response } from 'express';
import { asyncHandler } from '../middleware/asyncHandler';
import { validate } from '../middleware/validation';
import { ChatService } from '../services/chat/ChatService';
import { SendMessageSchema } from '../types/schema';

export function createChatRouter(chatService: ChatService): express.Router {
  const router = express.Router();

  // Answers a user message as the given agent
  router.post('/send-message', asyncHandler(async (req: Request, res: Response) => {
    const body = validate(SendMessageSchema, req.body);
    const reply = await chatService.processMessage({
      agentId: body.agent_id,
      message: body.message,
      leadId: body.lead_id
    });
    res.json(reply);
  }));

  return router;
}
