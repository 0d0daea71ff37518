import type { Chunk, ChatMessage } from '@ragkit/core';

export const RAG_SYSTEM_PROMPT = `You are a helpful assistant. Answer questions based ONLY on the provided context.
If the context doesn't contain enough information to answer the question, say so honestly.
Be concise and helpful in your responses.`;

/**
 * Number retrieved chunks as sources, 1-based
 */
export function buildContextBlock(chunks: Pick<Chunk, 'content'>[]): string {
  return chunks
    .map((chunk, i) => `[Source ${i + 1}]\n${chunk.content}\n\n`)
    .join('');
}

export function buildUserPrompt(context: string, question: string): string {
  return `Context:\n${context}\nQuestion: ${question}`;
}

/**
 * System instruction plus one user turn carrying context and question
 */
export function buildAnswerMessages(chunks: Pick<Chunk, 'content'>[], question: string): ChatMessage[] {
  return [
    { role: 'system', content: RAG_SYSTEM_PROMPT },
    { role: 'user', content: buildUserPrompt(buildContextBlock(chunks), question) }
  ];
}
