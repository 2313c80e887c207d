/**
 * Serve Command
 *
 * Start the HTTP API server
 */

import { createChurnlineAPI } from '../../serving/api.js';
import { errorMessage } from '../../core/errors.js';
import { logger } from '../../core/utils/logger.js';
import type { ChurnlineConfig } from '../lib/config.js';
import { EXIT_CODES, type ExitCode } from '../lib/exit-codes.js';

export async function serveCommand(config: ChurnlineConfig): Promise<ExitCode> {
  const { port, host, corsOrigins, maxBodyBytes } = config.server;

  logger.info('Starting Churnline API server...', {
    port,
    host,
    scorer: config.scorer.command,
    fallbackEnabled: config.pipeline.fallbackEnabled,
    configPath: config.configPath,
  });

  const api = createChurnlineAPI(config, { port, host, corsOrigins, maxBodyBytes });

  try {
    const address = await api.start();
    const base = `http://${address.address}:${address.port}`;
    logger.info('Server started successfully', {
      url: base,
      endpoints: {
        health: `${base}/v1/health`,
        upload: `${base}/v1/upload`,
        run: `${base}/v1/run`,
        download: `${base}/v1/predictions/download`,
      },
    });
  } catch (error) {
    logger.error('Failed to start server', { error: errorMessage(error) });
    return EXIT_CODES.ERRORS;
  }

  const shutdown = (signal: string): void => {
    logger.info('Received shutdown signal, stopping server...', { signal });
    api.stop().then(
      () => process.exit(EXIT_CODES.SUCCESS),
      (error: unknown) => {
        logger.error('Error while stopping server', { error: errorMessage(error) });
        process.exit(EXIT_CODES.ERRORS);
      }
    );
  };

  process.once('SIGTERM', shutdown);
  process.once('SIGINT', shutdown);

  return EXIT_CODES.SUCCESS;
}
