import 'dotenv/config';

/** First-character alphabet of participant codes; one input channel per character. */
export const SESSION_CODE_CHARSET = 'abcdefghijklmnopqrstuvwxyz0123456789';

const DEFAULT_KEY_PREFIX = 'browser-bots';

function seconds(value: string | undefined, fallback: number): number {
  const parsed = Number(value);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

function positiveInt(value: string | undefined, fallback: number): number {
  const parsed = Number(value);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback;
}

export const config = {
  port: parseInt(process.env.PORT || '8081', 10),
  host: process.env.HOST || '0.0.0.0',
  redisUrl: process.env.REDIS_URL || 'redis://localhost:6379',
  logLevel: process.env.LOG_LEVEL || 'info',
  bots: {
    keyPrefix: process.env.BOTWORKER_KEY_PREFIX || DEFAULT_KEY_PREFIX,
    charRange: process.env.BOTWORKER_CHAR_RANGE || SESSION_CODE_CHARSET,
    // LRU cap on sessions held in worker memory
    sessionLimit: positiveInt(process.env.BOTWORKER_SESSION_LIMIT, 50),
    responseTtlSeconds: seconds(process.env.BOTWORKER_RESPONSE_TTL_S, 60),
    completionGroupPrefix: 'browser-bots-client',
  },
  // all in seconds; BLPOP accepts fractional timeouts
  timeouts: {
    listenSeconds: seconds(process.env.BOTWORKER_LISTEN_TIMEOUT_S, 3),
    pingSeconds: seconds(process.env.BOTWORKER_PING_TIMEOUT_S, 1),
    initializeSeconds: seconds(process.env.BOTWORKER_INITIALIZE_TIMEOUT_S, 1),
    prepareSeconds: seconds(process.env.BOTWORKER_PREPARE_TIMEOUT_S, 3),
    consumeSeconds: seconds(process.env.BOTWORKER_CONSUME_TIMEOUT_S, 1),
  },
};

export type BotTimeouts = typeof config.timeouts;
