#!/usr/bin/env node
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';

import { loadConfig } from './core/config.js';
import { createLogger } from './core/logger.js';
import { openCredentialStore } from './credentials/store.js';
import type { CredentialStore } from './credentials/types.js';
import { FinanzOnlineClient } from './finanzonline/client.js';
import { describeError, handleTool, type ToolContext } from './mcp/handlers.js';
import { TOOLS } from './mcp/tools.js';

const log = createLogger('mcp');

function ok(text: string) {
  return { content: [{ type: 'text' as const, text }] };
}
function err(message: string) {
  return { content: [{ type: 'text' as const, text: `❌ Error: ${message}` }], isError: true };
}

const config = loadConfig();

let store: CredentialStore | undefined;
let client: FinanzOnlineClient | undefined;

const context: ToolContext = {
  credentials: () => (store ??= openCredentialStore(config.home, config.masterPassword)),
  finanzOnline: () => (client ??= FinanzOnlineClient.fromConfig(config)),
  now: () => new Date(),
};

// ── MCP server ──────────────────────────────────────────────────────────────
const server = new Server(
  { name: 'fo-toolkit', version: '0.1.0' },
  { capabilities: { tools: {} } },
);

server.setRequestHandler(ListToolsRequestSchema, async () => ({ tools: TOOLS }));

server.setRequestHandler(CallToolRequestSchema, async (request) => {
  const { name, arguments: args = {} } = request.params;
  try {
    return ok(await handleTool(name, args, context));
  } catch (e) {
    log.warn({ err: e, tool: name }, 'tool failed');
    return err(describeError(e));
  }
});

async function main() {
  const transport = new StdioServerTransport();
  await server.connect(transport);
  log.info({ tools: TOOLS.length }, 'fo-mcp listening on stdio');
}

main().catch((e: unknown) => {
  log.fatal({ err: e }, 'fo-mcp failed to start');
  process.exit(1);
});
