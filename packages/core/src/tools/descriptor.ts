import type { ZodTypeAny } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import type { ToolDescriptor } from '@findr/shared/src/types/tool.types.js';

export interface DescriptorOptions {
  readonly name: string;
  readonly title: string;
  readonly description: string;
  readonly inputSchema: ZodTypeAny;
}

export function buildToolDescriptor(options: DescriptorOptions): ToolDescriptor {
  const jsonSchema = zodToJsonSchema(options.inputSchema, {
    target: 'jsonSchema7',
    $refStrategy: 'none',
  });

  const inputSchema: Record<string, unknown> = {
    ...jsonSchema,
    $id: `urn:findr:tools:${options.name}:input`,
    title: options.title,
  };

  return {
    name: options.name,
    description: options.description,
    inputSchema,
  };
}
