import { randomUUID } from 'node:crypto';
import { DEFAULT_TOOLS_CONFIG_PATH, loadToolsConfig } from '@findr/schemas/src/config-loader.js';
import { createDefaultTools } from '@findr/core/src/tools/default-tools.js';
import { createToolRegistry } from '@findr/core/src/tools/tool-registry.js';
import { createMockCustomSearchClient } from '@findr/core/src/tools/web-search/mock-custom-search-client.js';
import type { ToolTrace } from '@findr/shared/src/types/tool.types.js';

function parseInput(raw: string | undefined): unknown {
  if (!raw) {
    return {};
  }
  try {
    return JSON.parse(raw) as unknown;
  } catch {
    // Plain text is taken as the query.
    return { q: raw };
  }
}

async function main(): Promise<void> {
  const toolName = process.argv[2];
  if (!toolName) {
    console.error('Usage: run-tool <tool-name> [input-json | query] [config-path]');
    process.exit(2);
  }

  const input = parseInput(process.argv[3]);
  const explicitPath = process.argv[4] ?? process.env['FINDR_CONFIG'];
  const configPath = explicitPath ?? DEFAULT_TOOLS_CONFIG_PATH;
  const mock = process.env['FINDR_MOCK_SEARCH'] === 'true';

  console.log('=== findr Tool Runner ===\n');
  console.log(`Tool: ${toolName}`);
  console.log(`Input: ${JSON.stringify(input)}`);
  console.log(`Config: ${configPath}`);
  console.log(`Mock web search: ${mock ? 'yes' : 'no'}\n`);

  const config = await loadToolsConfig(configPath, process.env, {
    optional: explicitPath === undefined,
  });
  const registry = createToolRegistry(
    createDefaultTools(config, {
      webSearch: mock ? { createClient: () => createMockCustomSearchClient() } : undefined,
    }),
  );

  const events: string[] = [];
  const trace: ToolTrace = {
    traceId: randomUUID(),
    addEvent(name, attributes) {
      events.push(`${name} ${JSON.stringify(attributes ?? {})}`);
    },
  };

  const startTime = Date.now();
  const envelope = await registry.invoke(toolName, { input }, trace);
  const elapsed = Date.now() - startTime;

  console.log('--- Trace ---');
  for (const event of events) {
    console.log(`  ${event}`);
  }

  console.log('\n--- Envelope ---');
  console.log(JSON.stringify(envelope, null, 2));
  console.log(`\nCompleted in ${String(elapsed)}ms`);

  if ('error' in envelope) {
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  console.error('Tool run failed:', error instanceof Error ? error.message : String(error));
  process.exit(1);
});
