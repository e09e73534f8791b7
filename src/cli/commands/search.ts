import type { Command } from '../types.js';
import { loadPipeline, parseIntFlag, positionalArgs } from '../utils.js';
import { buildPrompt } from '../../retrieval/prompt-builder.js';

export const searchCommand: Command = {
  name: 'search',
  description: 'Retrieve ranked contexts for a query',
  usage: 'docsearch search <query> [--k <n>] [--json] [--prompt]',
  handler: async (args) => {
    const query = positionalArgs(args, ['--k']).join(' ');
    if (!query.trim()) {
      console.error('Error: Query required');
      console.log('Usage: docsearch search <query> [--k <n>] [--json] [--prompt]');
      process.exit(2);
    }

    const { config, context, pipeline } = await loadPipeline();
    try {
      const k = parseIntFlag(args, '--k') ?? config.defaultK;
      const response = await pipeline.retrieve(query, k);

      if (args.includes('--json')) {
        console.log(JSON.stringify(response, null, 2));
        return;
      }
      if (args.includes('--prompt')) {
        console.log(buildPrompt(response.contexts, query));
        return;
      }

      if (response.degraded.length > 0) {
        console.log(`(degraded: ${response.degraded.join(', ')})`);
      }
      response.contexts.forEach((c, i) => {
        const score = c.rerankScore ?? c.score;
        console.log(`${i + 1}. [${score.toFixed(3)}] ${c.title ?? c.url ?? c.id}`);
        console.log(`   ${c.text.slice(0, 160).replace(/\s+/g, ' ')}`);
      });
      if (response.urls.length > 0) {
        console.log('');
        console.log('Sources:');
        for (const url of response.urls) {
          console.log(`  ${url}`);
        }
      }
      console.log('');
      console.log(
        `${response.contexts.length} of ${response.totalConsidered} candidates in ${response.durationMs}ms`,
      );
    } finally {
      await context.dispose();
    }
  },
};
