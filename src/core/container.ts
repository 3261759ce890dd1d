import { isDatabaseConfigured } from '../config/database';
import { DEFAULT_AGENT_ID } from '../config/environment';
import { ChatModel, OpenAIService } from '../services/ai/OpenAIService';
import { ChatService } from '../services/chat/ChatService';
import { ConversationStore, InMemoryConversationStore, PostgresConversationStore } from '../services/conversationHistory';
import { AgentDirectory, AgentService, InMemoryAgentDirectory } from '../services/database/AgentService';
import { InMemoryMemoryRepository } from '../services/memory/InMemoryMemoryRepository';
import { MemoryRepository } from '../services/memory/MemoryRepository';
import { MemoryService } from '../services/memory/MemoryService';
import { PostgresMemoryRepository } from '../services/memory/PostgresMemoryRepository';
import { MessageIdCache } from '../services/webhook/MessageIdCache';
import { MessageSender, WhatsAppClient } from '../services/whatsapp';
import { Logger, logger as defaultLogger } from '../utils/logger';

export interface ServiceContainer {
  agents: AgentDirectory;
  memoryService: MemoryService;
  conversations: ConversationStore;
  chatService: ChatService;
  sender: MessageSender;
  messageIdCache: MessageIdCache;
  defaultAgentId?: string;
  storage: 'postgres' | 'memory';
}

export interface ContainerOverrides {
  agents?: AgentDirectory;
  memoryRepository?: MemoryRepository;
  conversations?: ConversationStore;
  model?: ChatModel;
  sender?: MessageSender;
  messageIdCache?: MessageIdCache;
  logger?: Logger;
  extractionEnabled?: boolean;
  usePostgres?: boolean;
  defaultAgentId?: string;
}

/**
 * Wires services together. Postgres-backed when DB_HOST is set, process-local otherwise.
 */
export function createContainer(overrides: ContainerOverrides = {}): ServiceContainer {
  const logger = overrides.logger ?? defaultLogger;
  const usePostgres = overrides.usePostgres ?? isDatabaseConfigured();
  const defaultAgentId = overrides.defaultAgentId ?? DEFAULT_AGENT_ID;

  let agents: AgentDirectory;
  if (overrides.agents) {
    agents = overrides.agents;
  } else if (usePostgres) {
    agents = new AgentService(logger);
  } else {
    // Without a database the default agent runs on the built-in profile
    agents = new InMemoryAgentDirectory(defaultAgentId ? [{ id: defaultAgentId }] : []);
  }

  const memoryRepository = overrides.memoryRepository
    ?? (usePostgres
      ? new PostgresMemoryRepository(logger)
      : new InMemoryMemoryRepository({ agentIds: defaultAgentId ? [defaultAgentId] : [] }));
  const conversations = overrides.conversations
    ?? (usePostgres ? new PostgresConversationStore(logger) : new InMemoryConversationStore());

  const memoryService = new MemoryService(memoryRepository, logger);
  const chatService = new ChatService({
    agents,
    memories: memoryService,
    conversations,
    model: overrides.model ?? new OpenAIService(logger),
    logger,
    extractionEnabled: overrides.extractionEnabled
  });

  return {
    agents,
    memoryService,
    conversations,
    chatService,
    sender: overrides.sender ?? new WhatsAppClient(logger),
    messageIdCache: overrides.messageIdCache ?? new MessageIdCache(),
    defaultAgentId,
    storage: usePostgres ? 'postgres' : 'memory'
  };
}
