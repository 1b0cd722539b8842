import { z } from 'zod';

export const ConfigSchema = z.object({
  llm: z
    .object({
      model: z.string().min(1).default('gpt-5-mini'),
      baseUrl: z.string().url().default('https://api.openai.com/v1'),
      timeoutMs: z.number().int().positive().default(120_000),
    })
    .default({}),
  template: z.string().optional(),
  envPath: z.string().optional(),
});

export type Config = z.infer<typeof ConfigSchema>;
