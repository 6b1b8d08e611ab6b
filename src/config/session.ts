import session from 'express-session';
import RedisStore from 'connect-redis';
import { createClient } from 'redis';
import { RequestHandler } from 'express';
import { logger } from '../utils/logger';
import { SESSION_COOKIE_NAME, SESSION_MAX_AGE_MS } from '../types/constants';
import { AppConfig } from './env';

type RedisClient = ReturnType<typeof createClient>;

export interface SessionSetup {
  sessionMiddleware: RequestHandler;
  store: session.Store | undefined;
  // Resolves once the backing store can serve requests
  ready: () => Promise<void>;
  close: () => Promise<void>;
}

const REDIS_CONNECT_TIMEOUT_MS = 10000;

const createRedisClient = (redisUrl: string): RedisClient => {
  const client = createClient({
    url: redisUrl,
    socket: {
      connectTimeout: REDIS_CONNECT_TIMEOUT_MS,
      reconnectStrategy: (retries: number) => {
        if (retries > 10) {
          logger.error('Redis reconnection failed after 10 retries for session store');
          return new Error('Redis reconnection limit exceeded');
        }
        return Math.min(retries * 100, 3000);
      },
    },
  });

  client.on('error', (err: Error) => {
    logger.error('Redis client error for session store', { error: err.message });
  });

  client.on('ready', () => {
    logger.info('Redis client ready for session storage');
  });

  return client;
};

/**
 * Build the express-session middleware. Sessions live in Redis when
 * REDIS_URL is set (required in production) and in memory otherwise.
 */
export const createSessionSetup = (config: AppConfig): SessionSetup => {
  if (config.isProduction && !config.redisUrl) {
    throw new Error('REDIS_URL is required in production');
  }

  let redisClient: RedisClient | null = null;
  let store: session.Store | undefined;

  if (config.redisUrl) {
    redisClient = createRedisClient(config.redisUrl);
    store = new RedisStore({ client: redisClient, prefix: 'classhub:sess:' });
    logger.info('Redis session store initialized');
  } else {
    logger.warn('Using memory session store (not recommended for production)');
  }

  const sessionMiddleware = session({
    secret: config.sessionSecret,
    name: SESSION_COOKIE_NAME,
    resave: false,
    saveUninitialized: false,
    store,
    cookie: {
      secure: config.isProduction,
      httpOnly: true,
      maxAge: SESSION_MAX_AGE_MS,
      sameSite: 'lax',
    },
  });

  const client = redisClient;

  return {
    sessionMiddleware,
    store,
    ready: async () => {
      if (!client || client.isOpen) {
        return;
      }
      await client.connect();
      logger.info('Redis session store connected successfully');
    },
    close: async () => {
      if (client?.isOpen) {
        await client.quit();
      }
    },
  };
};
