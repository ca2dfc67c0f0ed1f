import dotenv from 'dotenv';

dotenv.config();

export const env = {
  // Server
  PORT: parseInt(process.env.PORT || '3001', 10),
  NODE_ENV: process.env.NODE_ENV || 'development',

  // CORS / Socket.IO
  CLIENT_URL: process.env.CLIENT_URL || 'http://localhost:5173',

  // Target chat application
  CHAT_URL: process.env.CHAT_URL || 'https://chat.langchain.com',
  CHAT_HEADLESS: process.env.CHAT_HEADLESS !== 'false', // Default true
  CHAT_TIMEOUT: parseInt(process.env.CHAT_TIMEOUT || '30000', 10), // Copy button + network idle budget
  CHAT_NAVIGATION_TIMEOUT: parseInt(process.env.CHAT_NAVIGATION_TIMEOUT || '30000', 10),
  CHAT_DEFAULT_TIMEOUT: parseInt(process.env.CHAT_DEFAULT_TIMEOUT || '30000', 10), // Page-level locator timeout
  CHAT_INPUT_NAME: process.env.CHAT_INPUT_NAME || 'Ask me anything about',
  CHAT_COPY_LABEL: process.env.CHAT_COPY_LABEL || 'Copy',
  CHAT_SUBMIT_KEY: process.env.CHAT_SUBMIT_KEY || 'Enter',

  // Empirical delays
  CHAT_GRACE_DELAY_MS: parseInt(process.env.CHAT_GRACE_DELAY_MS || '2000', 10), // Before completion detection
  CHAT_SETTLE_DELAY_MS: parseInt(process.env.CHAT_SETTLE_DELAY_MS || '2000', 10), // When network idle never arrives
  CHAT_CLIPBOARD_SETTLE_MS: parseInt(process.env.CHAT_CLIPBOARD_SETTLE_MS || '300', 10),

  // Admission control
  MAX_CONCURRENT_EXTRACTIONS: parseInt(process.env.MAX_CONCURRENT_EXTRACTIONS || '2', 10),

  // Evaluation
  EVAL_MAX_CONCURRENCY: parseInt(process.env.EVAL_MAX_CONCURRENCY || '2', 10),
  EVAL_DATASET_PATH: process.env.EVAL_DATASET_PATH || 'data/eval-dataset.json',
  EVAL_EXPERIMENT_PREFIX: process.env.EVAL_EXPERIMENT_PREFIX || 'playwright-chat-langchain',

  // Judge model
  OPENAI_API_KEY: process.env.OPENAI_API_KEY,
  OPENAI_MODEL: process.env.OPENAI_MODEL || 'gpt-4o-mini',

  // Rate Limiting
  RATE_LIMIT_WINDOW_MS: parseInt(process.env.RATE_LIMIT_WINDOW_MS || '60000', 10), // 1 minute
  RATE_LIMIT_MAX_REQUESTS: parseInt(process.env.RATE_LIMIT_MAX_REQUESTS || '30', 10),
  RATE_LIMIT_ENABLED: process.env.RATE_LIMIT_ENABLED !== 'false', // Default true

  // Logging
  LOG_ACTIONS: process.env.LOG_ACTIONS !== 'false' && process.env.NODE_ENV !== 'test',
} as const;

export default env;
