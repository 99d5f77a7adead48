import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import type { Session } from '../session.js';
import { registerChatTool } from './tools/chat.js';
import { registerGenerateImageTool } from './tools/generateImage.js';
import { registerListModelsTool } from './tools/listModels.js';
import { registerGetWalletStatusTool } from './tools/getWalletStatus.js';

export const TOOL_NAMES = ['chat', 'generate_image', 'list_models', 'get_wallet_status'] as const;

export function createMcpServer(session: Session) {
  const server = new McpServer({
    name: 'x402-llm',
    version: '0.3.0',
    capabilities: {
      tools: {},
    },
  });

  registerChatTool(server, session);
  registerGenerateImageTool(server, session);
  registerListModelsTool(server, session);
  registerGetWalletStatusTool(server, session);

  return server;
}

export async function startMcpServer(session: Session) {
  const server = createMcpServer(session);
  const transport = new StdioServerTransport();
  await server.connect(transport);
  return { server };
}
