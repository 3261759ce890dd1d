/**
 * Configuration for the conversational memory store
 */

/**
 * Default minimum relevance_score a memory needs to be returned by search
 */
export const DEFAULT_MIN_RELEVANCE = 0.5;

/**
 * Default limit for search results
 */
export const DEFAULT_SEARCH_LIMIT = 5;

/**
 * Default limit for listing an agent's memories
 */
export const DEFAULT_LIST_LIMIT = 50;

/**
 * Weight given to a memory when the writer does not provide one
 */
export const DEFAULT_RELEVANCE_SCORE = 1.0;

/**
 * Messages of prior conversation sent to the model with each request
 */
export const HISTORY_WINDOW = 10;

/**
 * Messages kept per agent/lead conversation, older ones are deleted on write
 */
export const MAX_STORED_MESSAGES = 50;

/**
 * Upper bound of facts accepted from a single extraction
 */
export const MAX_EXTRACTED_FACTS = 5;
