import { serve } from '@hono/node-server';
import { createAuthServer } from './app.js';
import { createSessionCore } from './core.js';
import { createMemoryStorage, MemoryIdentityStore } from './storage/memory/index.js';
import { createDrizzleStorage } from './storage/drizzle/index.js';
import { getConfig } from './config/index.js';
import { setLogLevel, createLogger, describeError } from './logging/logger.js';
import { startRetentionSweep } from './jobs/retention-sweep.js';
import type { IStorage } from './storage/interfaces/index.js';

// Load configuration (throws ConfigurationError on invalid settings)
const config = getConfig();
setLogLevel(config.logging.level);

const logger = createLogger('server');

// Create storage based on environment
let storage: IStorage;

if (config.database.url) {
  logger.info('Using PostgreSQL storage');
  storage = createDrizzleStorage({
    url: config.database.url,
    statementTimeoutMs: config.database.statementTimeoutMs,
  });
} else {
  logger.warn('Using in-memory storage (no DATABASE_URL configured); sessions are lost on restart');
  storage = createMemoryStorage();
}

// Users live outside the session core; the bundled store is for development
const identityStore = new MemoryIdentityStore();

if (config.devUser?.password) {
  await identityStore.createUser({
    userName: config.devUser.userName,
    password: config.devUser.password,
  });
  logger.info('Seeded development user', { userName: config.devUser.userName });
}

const core = createSessionCore({
  storage,
  identityStore,
  provisioner: identityStore,
  jwt: config.jwt,
  refreshTokens: config.refreshTokens,
  twoFactor: config.twoFactor,
  externalAuth: config.externalAuth,
  cookies: config.cookies,
});

const app = createAuthServer({
  core,
  enableLogging: config.server.nodeEnv !== 'test',
});

const stopSweep = startRetentionSweep({
  repositories: storage,
  intervalMs: config.retention.sweepIntervalMs,
  gracePeriod: config.retention.gracePeriod,
});

// Start server
const server = serve(
  {
    fetch: app.fetch,
    port: config.server.port,
    hostname: config.server.host,
  },
  (info) => {
    logger.info('Session server listening', { address: info.address, port: info.port });
  }
);

function shutdown(signal: string): void {
  logger.info('Shutting down', { signal });
  stopSweep();
  server.close(() => {
    storage.close().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error('Failed to close storage', describeError(error));
        process.exit(1);
      }
    );
  });
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
