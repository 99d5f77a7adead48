import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { Session } from '../../session.js';
import { invalidArguments, toolError, toolResult, type ToolResult } from './result.js';

const ListModelsSchema = z
  .object({
    type: z.enum(['llm', 'image', 'all']).default('all'),
  })
  .strict();

export async function handleListModels(session: Session, rawArgs: unknown): Promise<ToolResult> {
  const parsed = ListModelsSchema.safeParse(rawArgs ?? {});
  if (!parsed.success) return invalidArguments(parsed.error);

  try {
    const llm = session.llm();
    const models =
      parsed.data.type === 'llm'
        ? await llm.listModels()
        : parsed.data.type === 'image'
          ? await llm.listImageModels()
          : await llm.listAllModels();
    return toolResult({ status: 'ok', models });
  } catch (err) {
    return toolError(err);
  }
}

export function registerListModelsTool(server: McpServer, session: Session) {
  server.registerTool(
    'list_models',
    {
      description: 'List available models with pricing. Free; no payment is made.',
      inputSchema: ListModelsSchema.shape,
    },
    (rawArgs) => handleListModels(session, rawArgs)
  );
}
