import { ValidationError } from './errors.js';

const PRIVATE_KEY_RE = /^(0x)?[a-fA-F0-9]{64}$/;
const MODEL_RE = /^[a-zA-Z0-9_-]+(\/[a-zA-Z0-9._-]+)?$/;

export const MAX_TOKENS_LIMIT = 1_000_000;

export type ChatRole = 'system' | 'user' | 'assistant';
export const CHAT_ROLES: readonly ChatRole[] = ['system', 'user', 'assistant'];

export function validatePrivateKey(key: string | undefined): void {
  if (!key) {
    throw new ValidationError('privateKey', 'Private key is required');
  }
  if (!PRIVATE_KEY_RE.test(key)) {
    throw new ValidationError('privateKey', 'Private key must be a 64-character hex string (with optional 0x prefix)');
  }
}

function parseHttpUrl(value: string): URL | null {
  try {
    const parsed = new URL(value);
    return parsed.protocol === 'http:' || parsed.protocol === 'https:' ? parsed : null;
  } catch {
    return null;
  }
}

export function validateApiUrl(apiUrl: string): void {
  if (!apiUrl) {
    throw new ValidationError('apiUrl', 'API URL is required');
  }
  if (!parseHttpUrl(apiUrl)) {
    throw new ValidationError('apiUrl', 'API URL must be an absolute http or https URL');
  }
}

export function validateModel(model: string): void {
  if (!model) {
    throw new ValidationError('model', 'Model is required');
  }
  if (!MODEL_RE.test(model)) {
    throw new ValidationError('model', "Invalid model format. Expected 'provider/model' or 'model-name'");
  }
}

export function validateMaxTokens(maxTokens: number): void {
  if (!Number.isInteger(maxTokens) || maxTokens < 0) {
    throw new ValidationError('maxTokens', 'max_tokens must be a non-negative integer');
  }
  if (maxTokens > MAX_TOKENS_LIMIT) {
    throw new ValidationError('maxTokens', 'max_tokens exceeds maximum allowed value');
  }
}

export function validateTemperature(temperature: number): void {
  if (Number.isNaN(temperature) || temperature < 0) {
    throw new ValidationError('temperature', 'temperature must be non-negative');
  }
  if (temperature > 2) {
    throw new ValidationError('temperature', 'temperature must be at most 2.0');
  }
}

export function validateTopP(topP: number): void {
  if (Number.isNaN(topP) || topP < 0) {
    throw new ValidationError('topP', 'top_p must be non-negative');
  }
  if (topP > 1) {
    throw new ValidationError('topP', 'top_p must be at most 1.0');
  }
}

export function validateMessages(messages: ReadonlyArray<{ role: string; content: string }>): void {
  if (messages.length === 0) {
    throw new ValidationError('messages', 'At least one message is required');
  }
  messages.forEach((m, i) => {
    if (!CHAT_ROLES.some((role) => role === m.role)) {
      throw new ValidationError(`messages[${i}].role`, `role must be one of ${CHAT_ROLES.join(', ')}`);
    }
  });
}
