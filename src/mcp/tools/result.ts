import type { ZodError } from 'zod';
import { errorMessage, isX402ClientError, type ErrorKind } from '../../errors.js';

export type ToolResult = {
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
};

export type ToolErrorCode = ErrorKind | 'internal_error';

export function toolResult(payload: unknown): ToolResult {
  return {
    content: [
      {
        type: 'text',
        text: JSON.stringify(payload),
      },
    ],
  };
}

export function toolError(err: unknown): ToolResult {
  const code: ToolErrorCode = isX402ClientError(err) ? err.kind : 'internal_error';
  return { ...toolResult({ status: 'error', code, message: errorMessage(err) }), isError: true };
}

export function invalidArguments(error: ZodError): ToolResult {
  const issue = error.issues[0];
  const message = issue ? `${issue.path.join('.') || 'arguments'}: ${issue.message}` : 'invalid arguments';
  return { ...toolResult({ status: 'error', code: 'validation', message }), isError: true };
}
