import dotenv from 'dotenv';

dotenv.config();

export type Environment = 'PRODUCTION' | 'DEBUG';
export type TextSearchLanguage = 'spanish' | 'english' | 'simple';

const environment = (process.env.ENVIRONMENT || 'PRODUCTION').toUpperCase();

if (environment !== 'PRODUCTION' && environment !== 'DEBUG') {
  throw new Error(`Invalid ENVIRONMENT: ${environment}. Must be 'PRODUCTION' or 'DEBUG'`);
}

const textSearchLanguage = (process.env.TEXT_SEARCH_LANGUAGE || 'spanish').toLowerCase();

if (textSearchLanguage !== 'spanish' && textSearchLanguage !== 'english' && textSearchLanguage !== 'simple') {
  throw new Error(`Invalid TEXT_SEARCH_LANGUAGE: ${textSearchLanguage}. Must be 'spanish', 'english' or 'simple'`);
}

export const ENVIRONMENT: Environment = environment;
export const PORT = parseInt(process.env.PORT || '3000', 10);
export const LOG_LEVEL = (process.env.LOG_LEVEL || (ENVIRONMENT === 'DEBUG' ? 'debug' : 'info')).toLowerCase();

export const WHATSAPP_API_TOKEN: string | undefined = process.env.WHATSAPP_API_TOKEN;
export const WHATSAPP_PHONE_NUMBER_ID: string | undefined = process.env.WHATSAPP_PHONE_NUMBER_ID;
export const WHATSAPP_WEBHOOK_VERIFY_TOKEN: string | undefined = process.env.WHATSAPP_WEBHOOK_VERIFY_TOKEN;
export const DEFAULT_AGENT_ID: string | undefined = process.env.DEFAULT_AGENT_ID;

export const MEMORY_EXTRACTION_ENABLED = (process.env.MEMORY_EXTRACTION_ENABLED || 'true').toLowerCase() !== 'false';
export const MEMORY_PURGE_CRON = process.env.MEMORY_PURGE_CRON || '0 0 * * *';
export const TEXT_SEARCH_LANGUAGE: TextSearchLanguage = textSearchLanguage;

if (ENVIRONMENT === 'PRODUCTION') {
  const missing = ['OPENAI_API_KEY', 'DB_HOST', 'WHATSAPP_API_TOKEN'].filter(name => !process.env[name]);
  if (missing.length > 0) {
    console.warn(`⚠️  WARNING: ENVIRONMENT is PRODUCTION but ${missing.join(', ')} not set`);
  }
}
