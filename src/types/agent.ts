// Agent (chatbot profile) definitions

export interface AgentPersonality {
  tone: string;
  formality_level: string;
  emoji_usage: string;
  language_style: string;
}

export interface AgentConfiguration {
  model: string;
  temperature: number;
  max_tokens: number;
}

export interface ExampleQA {
  question: string;
  answer: string;
}

export interface AgentProfile {
  id: string;
  name: string;
  description: string;
  purpose: string;
  welcome_message: string;
  personality: AgentPersonality;
  key_points: string[];
  special_instructions: string[];
  example_qa: ExampleQA[];
  configuration: AgentConfiguration;
}
