import { z } from 'zod';

/**
 * OpenAI embeddings response - only the fields we read
 */
export const openAIEmbeddingResponseSchema = z.object({
  data: z.array(z.object({
    index: z.number().int(),
    embedding: z.array(z.number())
  })),
  model: z.string().optional(),
  usage: z.object({
    prompt_tokens: z.number(),
    total_tokens: z.number()
  }).optional()
});

export type OpenAIEmbeddingResponse = z.infer<typeof openAIEmbeddingResponseSchema>;

/**
 * OpenAI chat completions response
 */
export const openAIChatResponseSchema = z.object({
  id: z.string().optional(),
  model: z.string().optional(),
  choices: z.array(z.object({
    index: z.number().int(),
    message: z.object({
      role: z.string(),
      content: z.string().nullable()
    }),
    finish_reason: z.string().nullable().optional()
  })),
  usage: z.object({
    prompt_tokens: z.number(),
    completion_tokens: z.number(),
    total_tokens: z.number()
  }).optional()
});

export type OpenAIChatResponse = z.infer<typeof openAIChatResponseSchema>;

/**
 * OpenAI error envelope
 */
export const openAIErrorSchema = z.object({
  error: z.object({
    message: z.string(),
    type: z.string().nullable().optional(),
    code: z.string().nullable().optional()
  })
});
