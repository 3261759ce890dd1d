import express, { Request, Response } from 'express';
import { ChatService } from '../services/chat/ChatService';
import { MessageIdCache } from '../services/webhook/MessageIdCache';
import { MessageSender, normalizeWhatsAppNumber } from '../services/whatsapp';
import { WhatsAppMessage, WhatsAppWebhookPayload } from '../types';
import { Logger, logger as defaultLogger } from '../utils/logger';

export const UNSUPPORTED_MESSAGE_REPLY = 'Lo siento, por ahora solo puedo procesar mensajes de texto.';
export const ERROR_REPLY = 'Lo siento, ha ocurrido un error al procesar tu mensaje. Por favor, intenta nuevamente.';

export interface WhatsAppWebhookOptions {
  chatService: ChatService;
  sender: MessageSender;
  messageIdCache: MessageIdCache;
  defaultAgentId?: string;
  verifyToken?: string;
  logger?: Logger;
}

export function createWhatsAppWebhook(options: WhatsAppWebhookOptions): express.Router {
  const { chatService, sender, messageIdCache, defaultAgentId, verifyToken } = options;
  const logger = options.logger ?? defaultLogger;
  const whatsappWebhook = express.Router();

  // Webhook verification (GET request from WhatsApp)
  whatsappWebhook.get('/whatsapp', (req: Request, res: Response) => {
    const mode = req.query['hub.mode'];
    const token = req.query['hub.verify_token'];
    const challenge = req.query['hub.challenge'];

    if (mode === 'subscribe' && verifyToken && token === verifyToken && typeof challenge === 'string') {
      logger.info('Webhook verified successfully');
      res.status(200).send(challenge);
    } else {
      logger.warn('Webhook verification failed');
      res.sendStatus(403);
    }
  });

  // Webhook message handler (POST request from WhatsApp)
  whatsappWebhook.post('/whatsapp', async (req: Request, res: Response) => {
    const payload: WhatsAppWebhookPayload = req.body;

    // Respond immediately to WhatsApp
    res.sendStatus(200);

    try {
      for (const entry of payload?.entry ?? []) {
        for (const change of entry.changes ?? []) {
          for (const message of change.value?.messages ?? []) {
            await handleIncomingMessage(message);
          }
        }
      }
    } catch (error) {
      logger.error('Error processing webhook:', error);
    }
  });

  async function handleIncomingMessage(message: WhatsAppMessage): Promise<void> {
    const startTime = Date.now();

    if (!messageIdCache.markIfNew(message.id)) {
      logger.info(`🔁 Skipping already processed message ${message.id}`);
      return;
    }

    const userPhone = normalizeWhatsAppNumber(message.from);
    logger.info(`📨 Message ${message.id} from ${userPhone} (${message.type})`);

    try {
      await sender.markAsRead(message.id);

      if (message.type !== 'text' || !message.text?.body.trim()) {
        logger.warn(`⚠️  Unsupported message type: ${message.type}`);
        await sender.sendMessage(userPhone, UNSUPPORTED_MESSAGE_REPLY);
        return;
      }

      if (!defaultAgentId) {
        throw new Error('DEFAULT_AGENT_ID is not configured');
      }

      const reply = await chatService.processMessage({
        agentId: defaultAgentId,
        message: message.text.body,
        leadId: userPhone
      });

      await sender.sendMessage(userPhone, reply.response);
      logger.info(`✅ Message handled successfully in ${Date.now() - startTime}ms`);
    } catch (error) {
      logger.error(`❌ Error handling message after ${Date.now() - startTime}ms:`, error);
      try {
        await sender.sendMessage(userPhone, ERROR_REPLY);
      } catch (sendError) {
        logger.error('Error sending error message:', sendError);
      }
    }
  }

  return whatsappWebhook;
}
