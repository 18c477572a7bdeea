import type { ToolTrace } from '@findr/shared/src/types/tool.types.js';
import { createChildLogger } from '@findr/shared/src/logger.js';

const log = createChildLogger('api:trace');

export function createLogTrace(traceId: string, requestId: string): ToolTrace {
  return {
    traceId,
    addEvent(name: string, attributes?: Record<string, unknown>): void {
      log.debug({ traceId, requestId, event: name, ...attributes }, 'Trace event');
    },
  };
}
