import type { AIMessage, BaseMessage } from '@langchain/core/messages';

/** Plain text of a message; array content keeps only its text parts. */
export function extractTextContent(message: BaseMessage): string {
  const { content } = message;
  if (typeof content === 'string') return content;
  return content
    .map((part) => (typeof part === 'object' && 'text' in part && typeof part.text === 'string' ? part.text : ''))
    .join('');
}

export function hasToolCalls(message: AIMessage): boolean {
  return (message.tool_calls?.length ?? 0) > 0;
}
