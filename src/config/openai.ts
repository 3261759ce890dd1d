// src/config/openai.ts
import OpenAI from 'openai';
import './environment';

export const openai = new OpenAI({
  apiKey: process.env.OPENAI_API_KEY || 'missing-api-key',
});

// Fallback for agents whose configuration does not name a model
export const DEFAULT_MODEL = process.env.OPENAI_MODEL || 'gpt-4o-mini';

// Extraction runs on every exchange, keep it on a small model
export const EXTRACTION_MODEL = process.env.OPENAI_EXTRACTION_MODEL || 'gpt-4o-mini';
