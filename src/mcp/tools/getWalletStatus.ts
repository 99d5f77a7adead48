import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { Session } from '../../session.js';
import { fundingMessageCompact, paymentLinks } from '../../wallet/funding.js';
import { toolError, toolResult, type ToolResult } from './result.js';

export function handleGetWalletStatus(session: Session): ToolResult {
  try {
    const address = session.walletAddress();
    return toolResult({
      status: 'ok',
      configured: address !== null,
      address,
      data_dir: session.store.dir,
      links: address ? paymentLinks(address) : null,
      funding_message: address ? fundingMessageCompact(address) : null,
      spending: session.spending(),
    });
  } catch (err) {
    return toolError(err);
  }
}

export function registerGetWalletStatusTool(server: McpServer, session: Session) {
  const description = `Query the local payment wallet.

Returns the wallet address (never the key), funding links and what this session has spent so far.

**Use this tool to:**
- Tell the user where to send USDC when a paid call fails for lack of funds
- Report spend after a series of paid calls`;

  server.registerTool(
    'get_wallet_status',
    {
      description,
      inputSchema: {},
    },
    async () => handleGetWalletStatus(session)
  );
}
