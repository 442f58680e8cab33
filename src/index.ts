#!/usr/bin/env node
import { loadConfig } from './config/index.js';
import { SmppClient } from './smpp/client.js';
import { startHealthServer, setSessionState } from './monitoring/health.js';
import { logger, maskAddress } from './monitoring/logger.js';

async function main() {
  const config = loadConfig();
  logger.level = config.logLevel;
  logger.info(
    { host: config.session.endpoint.host, port: config.session.endpoint.port, systemId: config.bind.systemId },
    'Configuration loaded',
  );

  // Start health/metrics HTTP server
  const healthServer = startHealthServer(config.health.port, config.health.bindAddress);

  const client = new SmppClient(config.session);
  let shuttingDown = false;

  client.on('state', setSessionState);

  client.on('message', (message) => {
    logger.info(
      { from: maskAddress(message.from.number), to: maskAddress(message.to.number), length: message.content.length },
      'Message received',
    );
    logger.debug({ content: message.content }, 'Message content');
  });

  client.on('terminated', (reason) => {
    if (shuttingDown) return;
    logger.fatal({ error: reason.message }, 'SMPP session terminated');
    healthServer.close();
    process.exit(1);
  });

  client.start();
  await client.bind(config.bind);

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    logger.info({ signal }, 'Received shutdown signal');
    shuttingDown = true;

    await client.close();
    healthServer.close();

    logger.info('Shutdown complete');
    process.exit(0);
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));
}

main().catch((err) => {
  logger.fatal({ err }, 'Failed to start');
  process.exit(1);
});
