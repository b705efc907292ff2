import type { Assistant } from '../assistant.js';
import { createApp } from './app.js';
import { closeDb } from '../storage/db.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('server');

/**
 * Listen on `port` until SIGINT/SIGTERM. Resolves after shutdown.
 */
export function startServer(assistant: Assistant, port: number): Promise<void> {
  const app = createApp(assistant);

  return new Promise((resolve, reject) => {
    const server = app.listen(port, (error?: Error) => {
      if (error) {
        if ('code' in error && error.code === 'EADDRINUSE') {
          log.error(`Port ${port} is already in use. Try: signalpath serve --port ${port + 1}`);
        }
        reject(error);
        return;
      }

      log.info(`Listening on http://localhost:${port}`);

      const shutdown = (): void => {
        log.info('Shutting down');
        server.close(() => {
          closeDb();
          resolve();
        });
      };
      process.once('SIGINT', shutdown);
      process.once('SIGTERM', shutdown);
    });
  });
}
