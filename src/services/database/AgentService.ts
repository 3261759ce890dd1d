import { QueryFn } from '../../config/database';
import { DEFAULT_MODEL } from '../../config/openai';
import { NotFoundError } from '../../core/errors';
import { AgentConfiguration, AgentPersonality, AgentProfile, ExampleQA } from '../../types/agent';
import { Logger, logger as defaultLogger } from '../../utils/logger';
import { BaseService } from './BaseService';

export interface AgentDirectory {
  getAgent(agentId: string): Promise<AgentProfile>;
}

export const DEFAULT_PERSONALITY: AgentPersonality = {
  tone: 'profesional',
  formality_level: 'semiformal',
  emoji_usage: 'moderado',
  language_style: 'claro y conciso'
};

export const DEFAULT_CONFIGURATION: AgentConfiguration = {
  model: DEFAULT_MODEL,
  temperature: 0.7,
  max_tokens: 1000
};

interface AgentRow {
  id: string;
  name: string | null;
  description: string | null;
  purpose: string | null;
  welcome_message: string | null;
  personality: unknown;
  key_points: unknown;
  special_instructions: unknown;
  example_qa: unknown;
  configuration: unknown;
}

function parseJson(value: unknown): unknown {
  if (typeof value !== 'string') {
    return value;
  }
  try {
    return JSON.parse(value);
  } catch {
    return undefined;
  }
}

function pickString(source: unknown, field: string): string | undefined {
  if (typeof source !== 'object' || source === null) {
    return undefined;
  }
  const value: unknown = Reflect.get(source, field);
  return typeof value === 'string' && value.trim() !== '' ? value : undefined;
}

function pickNumber(source: unknown, field: string): number | undefined {
  if (typeof source !== 'object' || source === null) {
    return undefined;
  }
  const value: unknown = Reflect.get(source, field);
  const parsed = typeof value === 'string' ? Number(value) : value;
  return typeof parsed === 'number' && Number.isFinite(parsed) && parsed !== 0 ? parsed : undefined;
}

function stringList(value: unknown): string[] {
  const parsed = parseJson(value);
  return Array.isArray(parsed) ? parsed.filter((item): item is string => typeof item === 'string') : [];
}

function exampleList(value: unknown): ExampleQA[] {
  const parsed = parseJson(value);
  if (!Array.isArray(parsed)) {
    return [];
  }
  return parsed.flatMap(item => {
    const question = pickString(item, 'question');
    const answer = pickString(item, 'answer');
    return question && answer ? [{ question, answer }] : [];
  });
}

/**
 * Builds a complete profile from a stored row, filling any missing personality or
 * configuration field with its default.
 */
export function toAgentProfile(row: AgentRow): AgentProfile {
  const personality = parseJson(row.personality);
  const configuration = parseJson(row.configuration);

  return {
    id: String(row.id),
    name: row.name || 'Assistant',
    description: row.description || '',
    purpose: row.purpose || 'Asistente virtual',
    welcome_message: row.welcome_message || '¡Hola! ¿En qué puedo ayudarte?',
    personality: {
      tone: pickString(personality, 'tone') ?? DEFAULT_PERSONALITY.tone,
      formality_level: pickString(personality, 'formality_level') ?? DEFAULT_PERSONALITY.formality_level,
      emoji_usage: pickString(personality, 'emoji_usage') ?? DEFAULT_PERSONALITY.emoji_usage,
      language_style: pickString(personality, 'language_style') ?? DEFAULT_PERSONALITY.language_style
    },
    key_points: stringList(row.key_points),
    special_instructions: stringList(row.special_instructions),
    example_qa: exampleList(row.example_qa),
    configuration: {
      model: pickString(configuration, 'model') ?? DEFAULT_CONFIGURATION.model,
      temperature: pickNumber(configuration, 'temperature') ?? DEFAULT_CONFIGURATION.temperature,
      max_tokens: Math.round(pickNumber(configuration, 'max_tokens') ?? DEFAULT_CONFIGURATION.max_tokens)
    }
  };
}

export class AgentService extends BaseService implements AgentDirectory {
  constructor(loggerInstance: Logger = defaultLogger, runQuery?: QueryFn) {
    super(loggerInstance, runQuery);
  }

  async getAgent(agentId: string): Promise<AgentProfile> {
    const row = await this.executeSingleQuery<AgentRow>(
      `SELECT id, name, description, purpose, welcome_message, personality, key_points,
              special_instructions, example_qa, configuration
       FROM agents
       WHERE id = $1`,
      [agentId]
    );

    if (!row) {
      throw new NotFoundError(`No agent found with id ${agentId}`);
    }
    return toAgentProfile(row);
  }
}

/**
 * Agents held in process, for running without a database and in tests.
 */
export class InMemoryAgentDirectory implements AgentDirectory {
  private agents = new Map<string, AgentProfile>();

  constructor(agents: Array<Partial<AgentProfile> & { id: string }> = []) {
    agents.forEach(agent => this.add(agent));
  }

  add(agent: Partial<AgentProfile> & { id: string }): AgentProfile {
    const profile = toAgentProfile({
      id: agent.id,
      name: agent.name ?? null,
      description: agent.description ?? null,
      purpose: agent.purpose ?? null,
      welcome_message: agent.welcome_message ?? null,
      personality: agent.personality,
      key_points: agent.key_points,
      special_instructions: agent.special_instructions,
      example_qa: agent.example_qa,
      configuration: agent.configuration
    });
    this.agents.set(profile.id, profile);
    return profile;
  }

  async getAgent(agentId: string): Promise<AgentProfile> {
    const agent = this.agents.get(agentId);
    if (!agent) {
      throw new NotFoundError(`No agent found with id ${agentId}`);
    }
    return agent;
  }
}
