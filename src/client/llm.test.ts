import { afterEach, describe, it, expect, vi } from 'vitest';
import { getLogLevel } from '../util/logger.js';
import { APIError, ValidationError } from '../errors.js';
import {
  TEST_ADDRESS,
  TEST_PRIVATE_KEY,
  challengeReply,
  fakeFetch,
  jsonReply,
  type RecordedCall,
  type Reply,
} from '../testing/fakeFetch.js';
import type { PaymentReceipt } from '../x402/handler.js';
import { LLMClient } from './llm.js';

const API = 'https://api.test';

const COMPLETION = {
  id: 'chatcmpl-1',
  object: 'chat.completion',
  created: 1,
  model: 'openai/gpt-4o',
  choices: [{ index: 0, message: { role: 'assistant', content: 'hello' }, finish_reason: 'stop' }],
  usage: { prompt_tokens: 3, completion_tokens: 1, total_tokens: 4 },
};

function client(...replies: Reply[]) {
  const { fetch, calls } = fakeFetch(...replies);
  const payments: Array<{ receipt: PaymentReceipt; url: string }> = [];
  const llm = new LLMClient({
    privateKey: TEST_PRIVATE_KEY,
    apiUrl: API,
    fetch,
    env: {},
    onPayment: (receipt, url) => payments.push({ receipt, url }),
  });
  return { llm, calls, payments };
}

function sentBody(call: RecordedCall | undefined): unknown {
  return JSON.parse(call?.body ?? 'null');
}

describe('LLMClient', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('requires a private key', () => {
    expect(() => new LLMClient({ env: {} })).toThrow(ValidationError);
  });

  it('keeps its configured log level to itself', () => {
    const before = getLogLevel();
    new LLMClient({ privateKey: TEST_PRIVATE_KEY, logLevel: 'silent', env: {} });
    expect(getLogLevel()).toBe(before);
  });

  it('exposes the wallet address and an empty ledger', () => {
    const { llm } = client();
    expect(llm.getWalletAddress()).toBe(TEST_ADDRESS);
    expect(llm.getSpending()).toEqual({ totalUsd: 0, calls: 0 });
    expect(llm.apiUrl).toBe(API);
  });

  describe('chat', () => {
    it('posts a single user message with default max_tokens', async () => {
      const { llm, calls } = client(jsonReply(200, COMPLETION));

      await expect(llm.chat('openai/gpt-4o', 'hi')).resolves.toBe('hello');
      expect(calls[0]?.url).toBe(`${API}/v1/chat/completions`);
      expect(sentBody(calls[0])).toEqual({
        model: 'openai/gpt-4o',
        messages: [{ role: 'user', content: 'hi' }],
        max_tokens: 1024,
      });
    });

    it('puts the system prompt first', async () => {
      const { llm, calls } = client(jsonReply(200, COMPLETION));
      await llm.chatWithSystem('openai/gpt-4o', 'hi', 'be brief');
      expect(sentBody(calls[0])).toMatchObject({
        messages: [
          { role: 'system', content: 'be brief' },
          { role: 'user', content: 'hi' },
        ],
      });
    });

    it('fails when the response has no choices', async () => {
      const { llm } = client(jsonReply(200, { ...COMPLETION, choices: [] }));
      await expect(llm.chat('openai/gpt-4o', 'hi')).rejects.toThrow(APIError);
    });

    it('pays for the call and records it', async () => {
      const { llm, calls, payments } = client(challengeReply('1000'), jsonReply(200, COMPLETION));

      await expect(llm.chat('openai/gpt-4o', 'hi')).resolves.toBe('hello');

      expect(calls).toHaveLength(2);
      expect(llm.getSpending()).toEqual({ totalUsd: 0.001, calls: 1 });
      expect(payments).toHaveLength(1);
      expect(payments[0]?.url).toBe(`${API}/v1/chat/completions`);
      expect(payments[0]?.receipt.amount).toBe('1000');
    });

    it('returns the paid answer when the payment hook throws', async () => {
      const warn = vi.spyOn(console, 'error').mockImplementation(() => undefined);
      const { fetch } = fakeFetch(challengeReply('1000000'), jsonReply(200, COMPLETION));
      const llm = new LLMClient({
        privateKey: TEST_PRIVATE_KEY,
        apiUrl: API,
        fetch,
        env: {},
        onPayment: () => {
          throw new Error('ENOSPC: no space left on device');
        },
      });

      await expect(llm.chat('openai/gpt-4o', 'hi')).resolves.toBe('hello');
      expect(llm.getSpending()).toEqual({ totalUsd: 1, calls: 1 });
      expect(warn).toHaveBeenCalledWith(
        'WARN [llm] payment audit failed {"path":"/v1/chat/completions","error":"ENOSPC: no space left on device"}',
      );
    });
  });

  describe('chatCompletion', () => {
    it('sends sampling parameters only when positive', async () => {
      const { llm, calls } = client(jsonReply(200, COMPLETION), jsonReply(200, COMPLETION));

      await llm.chatCompletion('openai/gpt-4o', [{ role: 'user', content: 'hi' }], {
        maxTokens: 50,
        temperature: 0.7,
        topP: 0.9,
      });
      expect(sentBody(calls[0])).toEqual({
        model: 'openai/gpt-4o',
        messages: [{ role: 'user', content: 'hi' }],
        max_tokens: 50,
        temperature: 0.7,
        top_p: 0.9,
      });

      await llm.chatCompletion('openai/gpt-4o', [{ role: 'user', content: 'hi' }], { temperature: 0, maxTokens: 0 });
      expect(sentBody(calls[1])).toEqual({
        model: 'openai/gpt-4o',
        messages: [{ role: 'user', content: 'hi' }],
        max_tokens: 1024,
      });
    });

    it('turns on live search, with explicit parameters taking precedence', async () => {
      const { llm, calls } = client(jsonReply(200, COMPLETION), jsonReply(200, COMPLETION));
      const messages = [{ role: 'user' as const, content: 'news?' }];

      await llm.chatCompletion('xai/grok-3', messages, { search: true });
      expect(sentBody(calls[0])).toMatchObject({ search_parameters: { mode: 'on' } });

      await llm.chatCompletion('xai/grok-3', messages, { search: true, searchParameters: { mode: 'auto' } });
      expect(sentBody(calls[1])).toMatchObject({ search_parameters: { mode: 'auto' } });
    });

    it('returns the parsed completion', async () => {
      const { llm } = client(jsonReply(200, COMPLETION));
      const res = await llm.chatCompletion('openai/gpt-4o', [{ role: 'user', content: 'hi' }]);
      expect(res.usage).toEqual({ prompt_tokens: 3, completion_tokens: 1, total_tokens: 4 });
      expect(res.choices[0]?.finish_reason).toBe('stop');
    });

    it('validates before sending anything', async () => {
      const { llm, calls } = client();
      await expect(llm.chatCompletion('bad model', [{ role: 'user', content: 'hi' }])).rejects.toThrow(
        ValidationError,
      );
      await expect(llm.chatCompletion('openai/gpt-4o', [])).rejects.toThrow(ValidationError);
      await expect(
        llm.chatCompletion('openai/gpt-4o', [{ role: 'user', content: 'hi' }], { temperature: 3 }),
      ).rejects.toThrow(ValidationError);
      expect(calls).toHaveLength(0);
    });
  });

  describe('model listing', () => {
    const models = {
      data: [
        { id: 'openai/gpt-4o', name: 'GPT-4o', provider: 'openai', inputPrice: 2.5, outputPrice: 10, contextLimit: 128000 },
      ],
    };
    const imageModels = {
      data: [{ id: 'google/nano-banana', name: 'Nano Banana', provider: 'google', pricePerImage: 0.05, supportedSizes: ['1024x1024'] }],
    };

    it('lists LLM models with a GET', async () => {
      const { llm, calls } = client(jsonReply(200, models));
      await expect(llm.listModels()).resolves.toEqual(models.data);
      expect(calls[0]).toMatchObject({ url: `${API}/v1/models`, method: 'GET' });
    });

    it('lists image models with defaults filled in', async () => {
      const { llm, calls } = client(jsonReply(200, imageModels));
      const list = await llm.listImageModels();
      expect(list).toEqual([{ ...imageModels.data[0], description: '', available: true }]);
      expect(calls[0]?.url).toBe(`${API}/v1/images/models`);
    });

    it('merges both lists with a type tag', async () => {
      const { llm } = client(jsonReply(200, models), jsonReply(200, imageModels));
      await expect(llm.listAllModels()).resolves.toEqual([
        {
          type: 'llm',
          id: 'openai/gpt-4o',
          name: 'GPT-4o',
          provider: 'openai',
          inputPrice: 2.5,
          outputPrice: 10,
          contextLimit: 128000,
        },
        {
          type: 'image',
          id: 'google/nano-banana',
          name: 'Nano Banana',
          provider: 'google',
          pricePerImage: 0.05,
          supportedSizes: ['1024x1024'],
        },
      ]);
    });

    it('surfaces listing failures as APIError', async () => {
      const { llm } = client(jsonReply(500, { error: 'down' }));
      await expect(llm.listModels()).rejects.toThrow(APIError);
    });
  });
});
