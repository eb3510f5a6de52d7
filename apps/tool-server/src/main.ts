import { loadServerConfig, log, logError } from '@toolsmith/common';
import { ToolService } from '@toolsmith/forge';
import { createLibrary } from '@toolsmith/library';
import { buildServer } from './server';

async function main() {
  const cfg = loadServerConfig();
  const service = new ToolService({ config: cfg, library: createLibrary(cfg) });
  const app = buildServer(service);

  const shutdown = async (signal: string) => {
    log(`[tool-server] ${signal} received, closing`);
    await app.close();
    process.exit(0);
  };
  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));

  await app.listen({ port: cfg.TOOL_SERVER_PORT, host: cfg.TOOL_SERVER_HOST });
  log(`[tool-server] listening on ${cfg.TOOL_SERVER_HOST}:${cfg.TOOL_SERVER_PORT} (tools: ${cfg.TOOLS_DIR})`);
}

main().catch((error: unknown) => {
  logError('[tool-server] failed to start', error);
  process.exit(1);
});
