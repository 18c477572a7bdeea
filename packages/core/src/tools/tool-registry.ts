import { createChildLogger } from '@findr/shared/src/logger.js';
import { ConfigurationError, ToolNotFoundError } from '@findr/shared/src/utils/errors.js';
import type {
  AgentTool,
  ToolDescriptor,
  ToolEnvelope,
  ToolRequest,
  ToolTrace,
} from '@findr/shared/src/types/tool.types.js';

const log = createChildLogger('tools:registry');

export interface ToolRegistry {
  list(): readonly ToolDescriptor[];
  get(name: string): AgentTool;
  invoke(name: string, request: ToolRequest, trace?: ToolTrace): Promise<ToolEnvelope>;
}

export function createToolRegistry(tools: readonly AgentTool[]): ToolRegistry {
  const byName = new Map<string, AgentTool>();

  for (const tool of tools) {
    if (byName.has(tool.name)) {
      throw new ConfigurationError(`Duplicate tool name: ${tool.name}`);
    }
    byName.set(tool.name, tool);
  }

  log.info({ tools: [...byName.keys()] }, 'Tool registry created');

  function get(name: string): AgentTool {
    const tool = byName.get(name);
    if (!tool) {
      throw new ToolNotFoundError(name);
    }
    return tool;
  }

  return {
    list(): readonly ToolDescriptor[] {
      return [...byName.values()].map((tool) => tool.descriptor);
    },

    get,

    async invoke(name: string, request: ToolRequest, trace?: ToolTrace): Promise<ToolEnvelope> {
      const tool = get(name);
      const start = Date.now();
      const envelope = await tool.invoke(request, trace);
      log.info(
        { tool: name, durationMs: Date.now() - start, failed: 'error' in envelope },
        'Tool invoked',
      );
      return envelope;
    },
  };
}
