import { ValidationError } from '../errors.js';
import { validateModel } from '../validation.js';
import { PaidApiClient, type PaidApiClientOptions } from './base.js';
import { ImageResponseSchema, type ImageGenerateOptions, type ImageResponse } from './types.js';

export const DEFAULT_IMAGE_MODEL = 'google/nano-banana';
export const DEFAULT_IMAGE_SIZE = '1024x1024';
// image generation is slower than chat
export const DEFAULT_IMAGE_TIMEOUT_MS = 120_000;

export class ImageClient extends PaidApiClient {
  constructor(options: PaidApiClientOptions = {}) {
    super('image', options, { timeoutMs: DEFAULT_IMAGE_TIMEOUT_MS });
  }

  async generate(prompt: string, options: ImageGenerateOptions = {}): Promise<ImageResponse> {
    if (!prompt.trim()) {
      throw new ValidationError('prompt', 'Prompt is required');
    }
    const model = options.model || DEFAULT_IMAGE_MODEL;
    validateModel(model);
    if (options.n !== undefined && (!Number.isInteger(options.n) || options.n < 1)) {
      throw new ValidationError('n', 'n must be a positive integer');
    }

    const body: Record<string, unknown> = {
      prompt,
      model,
      size: options.size || DEFAULT_IMAGE_SIZE,
      n: options.n ?? 1,
    };
    if (options.quality) body.quality = options.quality;

    const { data } = await this.post('/v1/images/generations', body, ImageResponseSchema);
    return data;
  }
}
