import { serve } from '@hono/node-server';
import { DEFAULT_TOOLS_CONFIG_PATH, loadToolsConfig } from '@findr/schemas/src/config-loader.js';
import { createDefaultTools } from '@findr/core/src/tools/default-tools.js';
import { createToolRegistry } from '@findr/core/src/tools/tool-registry.js';
import { createMockCustomSearchClient } from '@findr/core/src/tools/web-search/mock-custom-search-client.js';
import { createChildLogger } from '@findr/shared/src/logger.js';
import { createApp } from './app.js';

const log = createChildLogger('api:main');

async function main(): Promise<void> {
  const port = parseInt(process.env['PORT'] ?? '3000', 10);
  const explicitPath = process.env['FINDR_CONFIG'];
  const configPath = explicitPath ?? DEFAULT_TOOLS_CONFIG_PATH;

  // The default file may be absent; a path set in FINDR_CONFIG must exist.
  const config = await loadToolsConfig(configPath, process.env, {
    optional: explicitPath === undefined,
  });

  const tools = createDefaultTools(config, {
    webSearch:
      process.env['FINDR_MOCK_SEARCH'] === 'true'
        ? { createClient: () => createMockCustomSearchClient() }
        : undefined,
  });

  const app = createApp({ registry: createToolRegistry(tools) });

  log.info({ port, configPath }, 'Starting findr API server');

  serve({ fetch: app.fetch, port }, (info) => {
    log.info({ port: info.port }, 'findr API server running');
  });
}

main().catch((error: unknown) => {
  log.error(
    { error: error instanceof Error ? error.message : String(error) },
    'Failed to start API server',
  );
  process.exit(1);
});
