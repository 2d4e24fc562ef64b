#!/usr/bin/env node

// Hyperlayer MCP server entry point (stdio).
// Usage: hyperlayer [pack.json|pack.yaml ...]  Packs given on the command line are
// loaded before the server starts accepting calls.

import { loadReasoningConfig } from './config/reasoning-config.js';
import { KnowledgeBase } from './knowledge-base.js';
import { createServer, registerTools, startServer } from './mcp/server.js';
import { debug } from './shared/debug.js';

const kb = KnowledgeBase.open({ config: loadReasoningConfig() });
const server = createServer();
registerTools(server, kb);

async function main(packPaths: string[]): Promise<void> {
  for (const path of packPaths) {
    const result = await kb.loadFoundationPack(path);
    debug('mcp', 'Startup pack loaded', {
      name: result.name,
      inserted: result.inserted,
      errors: result.errors.length,
    });
  }
  await startServer(server);
}

main(process.argv.slice(2)).catch((err: unknown) => {
  debug('mcp', 'Fatal: failed to start server', {
    error: err instanceof Error ? err.message : String(err),
  });
  kb.close();
  process.exit(1);
});

// ---------------------------------------------------------------------------
// Shutdown handlers
// ---------------------------------------------------------------------------

process.on('SIGINT', () => {
  kb.close();
  process.exit(0);
});
process.on('SIGTERM', () => {
  kb.close();
  process.exit(0);
});
process.on('uncaughtException', (err) => {
  debug('mcp', 'Uncaught exception', { error: err.message });
  kb.close();
  process.exit(1);
});
