// src/types/index.ts
export interface WhatsAppMessage {
  from: string;
  id: string;
  timestamp: string;
  type: 'text' | 'audio' | 'image' | 'document' | 'sticker' | 'location' | 'interactive' | 'button' | 'unknown';
  text?: {
    body: string;
  };
  context?: {
    id: string;
  };
}

export interface WhatsAppWebhookPayload {
  object: string;
  entry?: Array<{
    id: string;
    changes?: Array<{
      value: {
        messaging_product: string;
        metadata: {
          display_phone_number: string;
          phone_number_id: string;
        };
        contacts?: Array<{
          profile: {
            name: string;
          };
          wa_id: string;
        }>;
        messages?: WhatsAppMessage[];
      };
      field: string;
    }>;
  }>;
}

export type ChatRole = 'user' | 'assistant';

export interface ConversationMessage {
  role: 'system' | ChatRole;
  content: string;
}

export interface ChatRequest {
  agentId: string;
  message: string;
  leadId?: string | null;
}

export interface ChatReply {
  response: string;
  suggested_actions: string[];
  context: {
    conversation_length: number;
    agent_name: string;
    personality: {
      tone: string;
      formality_level: string;
      emoji_usage: string;
      language_style: string;
    };
    memories_used: number;
  };
}
