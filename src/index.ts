import * as dotenv from 'dotenv';
import { loadConfig } from './config';
import { LedgerNode } from './ledger-node';
import { logger } from './scaling/structured-logger';

dotenv.config();

const COMPONENT = 'Main';

async function main(): Promise<void> {
  const config = loadConfig();

  logger.info(COMPONENT, 'Configuration loaded', {
    owner: config.owner,
    masterAdmin: config.masterAdmin,
    platformWallet: config.platformWallet,
    commissionRateBp: config.commissionRateBp,
    port: config.port,
    dataDir: config.dataDir ?? '(in-memory)',
  });

  const node = new LedgerNode(config);

  const shutdown = (signal: string): void => {
    logger.info(COMPONENT, `Received ${signal}, shutting down`);
    node
      .stop()
      .then(() => process.exit(0))
      .catch(error => {
        logger.error(COMPONENT, 'Shutdown failed', { error: String(error) });
        process.exit(1);
      });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  await node.start();
}

main().catch(error => {
  logger.error(COMPONENT, 'Fatal error', {
    error: error instanceof Error ? error.message : String(error),
  });
  process.exit(1);
});
