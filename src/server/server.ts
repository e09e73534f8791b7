import express from 'express';
import type { Server } from 'node:http';

import type { RetrievalPipeline } from '../retrieval/pipeline.js';
import { DEFAULT_K } from '../retrieval/pipeline.js';
import { createRetrieveRouter } from './routes/retrieve.js';
import { createHealthRouter } from './routes/health.js';
import { errorHandler } from './middleware/error-handler.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('server');

export interface AppOptions {
  /** k used when a request omits it. Default: 8 */
  defaultK?: number;
}

export function createApp(pipeline: RetrievalPipeline, options: AppOptions = {}) {
  const app = express();

  app.use(express.json());

  // API routes
  app.use('/api/health', createHealthRouter(pipeline));
  app.use('/api/retrieve', createRetrieveRouter(pipeline, options.defaultK ?? DEFAULT_K));

  // API error handler (must come after API routes)
  app.use('/api', errorHandler);

  return app;
}

export interface StartServerOptions extends AppOptions {
  /** Called once the HTTP server has closed, before the promise resolves. */
  onShutdown?: () => Promise<void>;
}

/**
 * Serve the retrieval API until SIGINT/SIGTERM.
 *
 * Resolves after the server has closed and `onShutdown` has run.
 */
export async function startServer(
  pipeline: RetrievalPipeline,
  port: number,
  options: StartServerOptions = {},
): Promise<void> {
  const app = createApp(pipeline, options);

  return new Promise((resolve, reject) => {
    const server: Server = app.listen(port, () => {
      log.info(`Retrieval API listening on http://localhost:${port}`, {
        corpusSize: pipeline.corpusSize,
      });

      // Graceful shutdown
      const shutdown = () => {
        log.info('Shutting down retrieval API...');
        process.off('SIGINT', shutdown);
        process.off('SIGTERM', shutdown);
        server.close(() => {
          const done = options.onShutdown ? options.onShutdown() : Promise.resolve();
          done.then(resolve, reject);
        });
      };
      process.on('SIGINT', shutdown);
      process.on('SIGTERM', shutdown);
    });

    server.on('error', (err: NodeJS.ErrnoException) => {
      if (err.code === 'EADDRINUSE') {
        log.error(`Port ${port} is already in use. Try: docsearch serve --port ${port + 1}`);
      }
      reject(err);
    });
  });
}
