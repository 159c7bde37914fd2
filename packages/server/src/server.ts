import { randomBytes } from 'crypto';
import { networkInterfaces } from 'os';
import { DocWriterClient, createLogger, errorMessage, loadConfig, loadEnvFile } from '@docwriter/core';
import { createApp } from './app.js';
import { findAvailablePort } from './port.js';

const HOST = '0.0.0.0';

/**
 * First non-internal IPv4 address, for the LAN URL in the startup log
 */
function getLocalIp(): string {
  for (const addresses of Object.values(networkInterfaces())) {
    for (const address of addresses ?? []) {
      if (address.family === 'IPv4' && !address.internal) {
        return address.address;
      }
    }
  }
  return '127.0.0.1';
}

async function main(): Promise<void> {
  // Load environment variables
  loadEnvFile();
  const config = loadConfig();
  const logger = createLogger(config.logLevel);

  let secretKey = config.web.secretKey;
  if (!secretKey) {
    secretKey = randomBytes(32).toString('hex');
    logger.warn('WEB_SECRET_KEY not set; using a random key, sessions will not survive a restart');
  }

  const client = new DocWriterClient({ config, logger });

  // Wait for client initialization
  await client.waitForInit();

  const app = createApp({
    client,
    secretKey,
    password: config.web.password,
    sessionTimeoutMinutes: config.web.sessionTimeoutMinutes,
    logger,
  });

  const port = await findAvailablePort(config.web.port, undefined, HOST);
  if (port !== config.web.port) {
    logger.info(`Port ${config.web.port} in use, using port ${port} instead`);
  }

  app.listen(port, HOST, () => {
    logger.info('Starting AI Document Writer');
    logger.info(`  Local:   http://127.0.0.1:${port}`);
    logger.info(`  LAN:     http://${getLocalIp()}:${port}`);
    if (config.web.password) {
      logger.info('Password authentication enabled');
    } else {
      logger.info('No WEB_PASSWORD set; access is open (set WEB_PASSWORD in .env to enable auth)');
    }
  });
}

main().catch((error: unknown) => {
  console.error('[DOCWRITER ERROR] Failed to start server:', errorMessage(error));
  process.exit(1);
});
