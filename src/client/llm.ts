import { APIError } from '../errors.js';
import {
  validateMaxTokens,
  validateMessages,
  validateModel,
  validateTemperature,
  validateTopP,
} from '../validation.js';
import { DEFAULT_TIMEOUT_MS } from '../config.js';
import { PaidApiClient, type PaidApiClientOptions } from './base.js';
import {
  ChatResponseSchema,
  ModelListSchema,
  type AllModel,
  type ChatCompletionOptions,
  type ChatMessage,
  type ChatResponse,
  type Model,
} from './types.js';

export const DEFAULT_MAX_TOKENS = 1024;

/** OpenAI-compatible chat client that pays per call over x402. */
export class LLMClient extends PaidApiClient {
  constructor(options: PaidApiClientOptions = {}) {
    super('llm', options, { timeoutMs: DEFAULT_TIMEOUT_MS });
  }

  /** One-shot prompt; returns the first choice's text. */
  async chat(model: string, prompt: string, options: { system?: string } = {}): Promise<string> {
    const messages: ChatMessage[] = [];
    if (options.system) {
      messages.push({ role: 'system', content: options.system });
    }
    messages.push({ role: 'user', content: prompt });

    const res = await this.chatCompletion(model, messages);
    const first = res.choices[0];
    if (!first) {
      throw new APIError(200, 'no choices in response');
    }
    return first.message.content;
  }

  chatWithSystem(model: string, prompt: string, system: string): Promise<string> {
    return this.chat(model, prompt, { system });
  }

  async chatCompletion(
    model: string,
    messages: ChatMessage[],
    options: ChatCompletionOptions = {},
  ): Promise<ChatResponse> {
    validateModel(model);
    validateMessages(messages);
    if (options.maxTokens !== undefined) validateMaxTokens(options.maxTokens);
    if (options.temperature !== undefined) validateTemperature(options.temperature);
    if (options.topP !== undefined) validateTopP(options.topP);

    const body: Record<string, unknown> = {
      model,
      messages,
      max_tokens: options.maxTokens || DEFAULT_MAX_TOKENS,
    };
    if (options.temperature && options.temperature > 0) body.temperature = options.temperature;
    if (options.topP && options.topP > 0) body.top_p = options.topP;
    if (options.searchParameters) {
      body.search_parameters = options.searchParameters;
    } else if (options.search) {
      body.search_parameters = { mode: 'on' };
    }

    const { data } = await this.post('/v1/chat/completions', body, ChatResponseSchema);
    return data;
  }

  async listModels(): Promise<Model[]> {
    const { data } = await this.get('/v1/models', ModelListSchema);
    return data;
  }

  /** LLM and image models in one list, LLMs first. */
  async listAllModels(): Promise<AllModel[]> {
    const llm = await this.listModels();
    const image = await this.listImageModels();
    return [
      ...llm.map(
        (m): AllModel => ({
          type: 'llm',
          id: m.id,
          name: m.name,
          provider: m.provider,
          inputPrice: m.inputPrice,
          outputPrice: m.outputPrice,
          contextLimit: m.contextLimit,
        }),
      ),
      ...image.map(
        (m): AllModel => ({
          type: 'image',
          id: m.id,
          name: m.name,
          provider: m.provider,
          pricePerImage: m.pricePerImage,
          supportedSizes: m.supportedSizes,
        }),
      ),
    ];
  }
}
