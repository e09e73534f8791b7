import type { RankedContext } from '../storage/types.js';

export const DEFAULT_INSTRUCTIONS =
  'Answer the user based ONLY on the context. ' +
  'Cite 1-3 sources using markdown links to their URLs. ' +
  'If not found, say you cannot find it in the docs and suggest closest relevant links. ' +
  'Keep the answer concise with bullet points and bold key terms.';

/**
 * Render one context as a Title/URL/Snippet block. Missing fields render empty.
 */
export function formatContext(context: RankedContext): string {
  return `Title: ${context.title ?? ''}\nURL: ${context.url ?? ''}\nSnippet: ${context.text}`;
}

/**
 * Assemble the answer-generation prompt from ranked contexts, in rank order.
 */
export function buildPrompt(
  contexts: readonly RankedContext[],
  query: string,
  instructions: string = DEFAULT_INSTRUCTIONS,
): string {
  const joined = contexts.map(formatContext).join('\n\n');
  return `${instructions}\n\nContext:\n${joined}\n\nQuestion: ${query}\nAnswer:`;
}
