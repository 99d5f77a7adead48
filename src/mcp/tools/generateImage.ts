import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { Session } from '../../session.js';
import { invalidArguments, toolError, toolResult, type ToolResult } from './result.js';

const GenerateImageSchema = z
  .object({
    prompt: z.string().min(1),
    model: z.string().optional(),
    size: z.string().regex(/^\d+x\d+$/).optional(),
    n: z.number().int().positive().max(4).optional(),
    quality: z.string().optional(),
  })
  .strict();

export async function handleGenerateImage(session: Session, rawArgs: unknown): Promise<ToolResult> {
  const parsed = GenerateImageSchema.safeParse(rawArgs);
  if (!parsed.success) return invalidArguments(parsed.error);
  const { prompt, ...options } = parsed.data;

  try {
    const image = session.image();
    const res = await image.generate(prompt, options);
    return toolResult({ status: 'ok', images: res.data, spending: image.getSpending() });
  } catch (err) {
    return toolError(err);
  }
}

export function registerGenerateImageTool(server: McpServer, session: Session) {
  server.registerTool(
    'generate_image',
    {
      description: 'Generate images from a text prompt. Paid per call via x402 from the local wallet. Returns image URLs or base64 data.',
      inputSchema: GenerateImageSchema.shape,
    },
    (rawArgs) => handleGenerateImage(session, rawArgs)
  );
}
