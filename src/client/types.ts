import { z } from 'zod';
import type { ChatRole } from '../validation.js';

export type ChatMessage = {
  role: ChatRole;
  content: string;
};

/** xAI live-search settings, forwarded verbatim as `search_parameters`. */
export type SearchParameters = {
  mode?: 'on' | 'off' | 'auto';
  [key: string]: unknown;
};

export type ChatCompletionOptions = {
  /** Defaults to 1024 when absent or 0. */
  maxTokens?: number;
  /** Sent only when greater than 0. */
  temperature?: number;
  /** Sent only when greater than 0. */
  topP?: number;
  /** Shortcut for `searchParameters: { mode: 'on' }`. */
  search?: boolean;
  searchParameters?: SearchParameters;
};

export type ImageGenerateOptions = {
  model?: string;
  size?: string;
  n?: number;
  quality?: string;
};

const UsageSchema = z.object({
  prompt_tokens: z.number().int().nonnegative().default(0),
  completion_tokens: z.number().int().nonnegative().default(0),
  total_tokens: z.number().int().nonnegative().default(0),
});

const ChoiceSchema = z.object({
  index: z.number().int().default(0),
  message: z.object({
    role: z.string(),
    content: z
      .string()
      .nullable()
      .transform((v) => v ?? ''),
  }),
  finish_reason: z.string().nullable().optional(),
});

export const ChatResponseSchema = z.object({
  id: z.string().default(''),
  object: z.string().default('chat.completion'),
  created: z.number().default(0),
  model: z.string().default(''),
  choices: z.array(ChoiceSchema),
  usage: UsageSchema.optional(),
});

export const ModelSchema = z.object({
  id: z.string(),
  name: z.string().default(''),
  provider: z.string().default(''),
  inputPrice: z.number().default(0), // USD per 1M tokens
  outputPrice: z.number().default(0),
  contextLimit: z.number().int().default(0),
});

export const ImageModelSchema = z.object({
  id: z.string(),
  name: z.string().default(''),
  provider: z.string().default(''),
  description: z.string().default(''),
  pricePerImage: z.number().default(0),
  supportedSizes: z.array(z.string()).optional(),
  maxPromptLength: z.number().int().optional(),
  available: z.boolean().default(true),
});

export const ModelListSchema = z.object({ data: z.array(ModelSchema) });
export const ImageModelListSchema = z.object({ data: z.array(ImageModelSchema) });

export const ImageResponseSchema = z.object({
  created: z.number().default(0),
  data: z.array(
    z.object({
      url: z.string().optional(),
      revised_prompt: z.string().optional(),
      b64_json: z.string().optional(),
    }),
  ),
});

export type ChatResponse = z.infer<typeof ChatResponseSchema>;
export type Model = z.infer<typeof ModelSchema>;
export type ImageModel = z.infer<typeof ImageModelSchema>;
export type ImageResponse = z.infer<typeof ImageResponseSchema>;

export type AllModel =
  | ({ type: 'llm' } & Pick<Model, 'id' | 'name' | 'provider' | 'inputPrice' | 'outputPrice' | 'contextLimit'>)
  | ({ type: 'image' } & Pick<ImageModel, 'id' | 'name' | 'provider' | 'pricePerImage' | 'supportedSizes'>);
