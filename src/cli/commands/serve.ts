import type { Command } from '../types.js';
import { loadPipeline, parseIntFlag } from '../utils.js';
import { startServer } from '../../server/server.js';

export const serveCommand: Command = {
  name: 'serve',
  description: 'Start the retrieval HTTP API',
  usage: 'docsearch serve [--port <port>]',
  handler: async (args) => {
    const port = parseIntFlag(args, '--port');
    const { config, context, pipeline } = await loadPipeline(
      port === undefined ? undefined : { server: { port } },
    );
    await startServer(pipeline, config.port, {
      defaultK: config.defaultK,
      onShutdown: () => context.dispose(),
    });
  },
};
