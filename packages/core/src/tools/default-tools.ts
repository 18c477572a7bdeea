import type { ToolsConfig } from '@findr/schemas/src/config-loader.js';
import type { AgentTool } from '@findr/shared/src/types/tool.types.js';
import { createCallSearchTool } from './call-search/call-search-tool.js';
import type { CallSearchToolDeps } from './call-search/call-search-tool.js';
import { createWebSearchTool } from './web-search/web-search-tool.js';
import type { WebSearchToolDeps } from './web-search/web-search-tool.js';

export interface DefaultToolDeps {
  readonly webSearch?: WebSearchToolDeps;
  readonly callSearch?: CallSearchToolDeps;
}

export function createDefaultTools(config: ToolsConfig, deps: DefaultToolDeps = {}): AgentTool[] {
  return [
    createWebSearchTool(config.webSearch, deps.webSearch),
    createCallSearchTool(config.callSearch, deps.callSearch),
  ];
}
