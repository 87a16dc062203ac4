import { z } from 'zod';

/**
 * Provider/model pair backing a chat model.
 */
export const modelConfigSchema = z.object({
  provider: z.string().min(1),
  model: z.string().min(1),
});

/**
 * One chat model configuration record as stored in a config file.
 */
export const chatModelConfigSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  description: z.string(),
  type: z.string().default('langchain'),
  owner: z.string().optional(),
  url: z.string().url().optional(),
  disabled: z.boolean().optional(),
  model: modelConfigSchema.optional(),
});

export type ModelConfig = z.infer<typeof modelConfigSchema>;
export type ChatModelConfig = z.infer<typeof chatModelConfigSchema>;
