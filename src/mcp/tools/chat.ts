import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { Session } from '../../session.js';
import type { ChatMessage } from '../../client/types.js';
import { invalidArguments, toolError, toolResult, type ToolResult } from './result.js';

const ChatSchema = z
  .object({
    model: z.string().min(1).describe('Model id, e.g. openai/gpt-4o or anthropic/claude-sonnet-4'),
    prompt: z.string().min(1),
    system: z.string().optional(),
    max_tokens: z.number().int().nonnegative().optional(),
    temperature: z.number().min(0).max(2).optional(),
    search: z.boolean().optional().describe('Enable live web search where the model supports it'),
  })
  .strict();

export async function handleChat(session: Session, rawArgs: unknown): Promise<ToolResult> {
  const parsed = ChatSchema.safeParse(rawArgs);
  if (!parsed.success) return invalidArguments(parsed.error);
  const args = parsed.data;

  const messages: ChatMessage[] = [];
  if (args.system) messages.push({ role: 'system', content: args.system });
  messages.push({ role: 'user', content: args.prompt });

  try {
    const llm = session.llm();
    const res = await llm.chatCompletion(args.model, messages, {
      maxTokens: args.max_tokens,
      temperature: args.temperature,
      search: args.search,
    });
    return toolResult({
      status: 'ok',
      model: res.model || args.model,
      content: res.choices[0]?.message.content ?? '',
      usage: res.usage ?? null,
      spending: llm.getSpending(),
    });
  } catch (err) {
    return toolError(err);
  }
}

export function registerChatTool(server: McpServer, session: Session) {
  const description = `Send a prompt to a hosted LLM. Each call is paid in USDC on Base from the local wallet via x402; the private key never leaves this machine.

Returns the assistant reply, token usage and the session's running spend.`;

  server.registerTool(
    'chat',
    {
      description,
      inputSchema: ChatSchema.shape,
    },
    (rawArgs) => handleChat(session, rawArgs)
  );
}
