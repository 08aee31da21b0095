// config.ts
import dotenv from 'dotenv';

dotenv.config({
  quiet: process.env.NODE_ENV === 'test',
});

export const config = {

  NAME: 'kraken-market-data',
  VERSION: '0.1.0',

  // Kraken public REST API, no credentials required
  REST_URL: 'https://api.kraken.com/0/public/',
  SOURCE: 'Kraken API',

  TOOL_NAME: 'get_ticker',
  PROMPT_NAME: 'kraken-ticker',
  PAIR_DESCRIPTION: 'Trading pair (e.g., BTCUSD, ETHUSD)',

  // transport defaults, overridden by CLI flags or env
  DEFAULT_TRANSPORT: 'stdio',
  DEFAULT_HOST: '127.0.0.1',
  DEFAULT_PORT: 8000,
  MCP_PATH: '/mcp',
  SESSION_IDLE_MS: 30 * 60 * 1000,
  SESSION_SWEEP_INTERVAL_MS: 60 * 1000,

  LOG_LEVEL: process.env.LOG_LEVEL || 'info',

  ERRORS: {
    MISSING_PAIR: 'Missing required argument: pair',
    INVALID_PAIR: 'Invalid argument: pair must be a non-empty string',
    NOT_AN_OBJECT: 'Invalid response from Kraken API: expected a JSON object',
    MISSING_RESULT: "Invalid response from Kraken API: missing 'result' field",
    EMPTY_RESULT: "Invalid response from Kraken API: 'result' holds no ticker entry",
    INVALID_SESSION: 'Bad Request: No valid session ID provided'
  }
} as const;

export type Config = typeof config;
