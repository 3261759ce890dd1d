/**
 * Centralized System Prompts
 * Builds the prompt an agent answers with and the prompt used to pull durable facts
 * out of an exchange.
 */

import { AgentProfile } from '../types/agent';
import { MemoryRecord } from '../types/memory';

export class SystemPrompts {
  /**
   * Agent System Prompt
   * Profile, tone and the facts already known about the lead
   */
  static getAgentPrompt(agent: AgentProfile, memories: Pick<MemoryRecord, 'key' | 'value'>[] = []): string {
    const { personality } = agent;

    const parts: string[] = [
      `Eres un asistente virtual para una agencia de viajes llamado ${agent.name}.`,
      `Propósito: ${agent.purpose}`,
      '',
      'PERSONALIDAD Y ESTILO DE COMUNICACIÓN:',
      `- Tono: ${personality.tone}`,
      `- Nivel de formalidad: ${personality.formality_level}`,
      `- Uso de emojis: ${personality.emoji_usage}`,
      `- Estilo de lenguaje: ${personality.language_style}`,
      ''
    ];

    if (agent.key_points.length > 0) {
      parts.push('PUNTOS CLAVE A CONSIDERAR:', ...agent.key_points.map(point => `- ${point}`), '');
    }

    if (agent.special_instructions.length > 0) {
      parts.push(
        'INSTRUCCIONES ESPECIALES:',
        ...agent.special_instructions.map(instruction => `- ${instruction}`),
        ''
      );
    }

    if (agent.example_qa.length > 0) {
      parts.push(
        'EJEMPLOS DE PREGUNTAS Y RESPUESTAS:',
        ...agent.example_qa.map(qa => `P: ${qa.question}\nR: ${qa.answer}`),
        ''
      );
    }

    if (memories.length > 0) {
      parts.push(
        'DATOS CONOCIDOS DEL CLIENTE (úsalos si son relevantes, no los repitas sin motivo):',
        ...memories.map(memory => `- ${memory.key}: ${memory.value}`),
        ''
      );
    }

    parts.push(
      `Recuerda mantener un tono ${personality.tone}, un nivel de formalidad ${personality.formality_level}, ` +
      `usar emojis de manera ${personality.emoji_usage} y mantener un estilo de lenguaje ${personality.language_style}.`
    );

    return parts.join('\n');
  }

  /**
   * Fact Extraction Prompt
   * Output is parsed by parseExtractedFacts
   */
  static getFactExtractionPrompt(maxFacts: number): string {
    return `You read one exchange between a travel-agency assistant and a customer and extract durable facts about the customer worth remembering for future conversations.

Rules:
- Only facts stated or clearly confirmed by the customer (preferences, destinations, dates, budget, party size, dietary needs, names).
- Ignore greetings, questions and anything the assistant said on its own.
- "key" is a short snake_case label in English, stable across conversations (e.g. "favorite_destination", "travel_budget").
- "value" is the fact in the customer's language, one sentence at most.
- "relevance_score" between 0 and 1: how useful the fact is for future recommendations.
- "ttl_days" only for facts that stop being true (e.g. a trip date); omit it otherwise.
- At most ${maxFacts} facts. Return an empty list when there is nothing durable.

Respond with JSON only:
{"memories": [{"key": "favorite_destination", "value": "Bali", "relevance_score": 0.9}]}`;
  }
}
