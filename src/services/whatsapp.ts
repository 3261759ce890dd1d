// src/services/whatsapp.ts
import axios, { AxiosInstance } from 'axios';
import { WHATSAPP_API_TOKEN, WHATSAPP_PHONE_NUMBER_ID } from '../config/environment';
import { Logger, logger as defaultLogger } from '../utils/logger';

const WHATSAPP_API_URL = 'https://graph.facebook.com/v22.0';

export interface MessageSender {
  sendMessage(to: string, message: string): Promise<void>;
  markAsRead(messageId: string): Promise<void>;
}

export class WhatsAppClient implements MessageSender {
  constructor(
    private logger: Logger = defaultLogger,
    private http: AxiosInstance = axios.create({ baseURL: WHATSAPP_API_URL, timeout: 15000 }),
    private phoneNumberId: string | undefined = WHATSAPP_PHONE_NUMBER_ID,
    private accessToken: string | undefined = WHATSAPP_API_TOKEN
  ) {}

  async sendMessage(to: string, message: string): Promise<void> {
    try {
      await this.http.post(
        `/${this.phoneNumberId}/messages`,
        {
          messaging_product: 'whatsapp',
          to: to,
          text: { body: message }
        },
        { headers: this.headers() }
      );
      this.logger.info(`Message sent to ${to}`);
    } catch (error) {
      this.logger.error('Error sending WhatsApp message:', error);
      throw error;
    }
  }

  async markAsRead(messageId: string): Promise<void> {
    try {
      await this.http.post(
        `/${this.phoneNumberId}/messages`,
        {
          messaging_product: 'whatsapp',
          status: 'read',
          message_id: messageId
        },
        { headers: this.headers() }
      );
    } catch (error) {
      // Read receipts are cosmetic
      this.logger.warn('Error marking message as read:', error);
    }
  }

  private headers(): Record<string, string> {
    return {
      'Authorization': `Bearer ${this.accessToken}`,
      'Content-Type': 'application/json'
    };
  }
}

export function normalizeWhatsAppNumber(number: string): string {
  const cleaned = number.replace(/[^\d+]/g, '');
  if (cleaned.startsWith('+')) {
    return cleaned;
  }
  if (cleaned.startsWith('00')) {
    return `+${cleaned.slice(2)}`;
  }
  return `+${cleaned}`;
}
