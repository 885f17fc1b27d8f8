import { DynamicStructuredTool } from '@langchain/core/tools';
import type { z } from 'zod';

/**
 * A named operation the assistant may call while answering. Parameters are
 * described by a zod object schema; the result is always text.
 */
export interface Capability<S extends z.AnyZodObject = z.AnyZodObject> {
  name: string;
  description: string;
  schema: S;
  invoke(args: z.infer<S>): Promise<string> | string;
}

export function defineCapability<S extends z.AnyZodObject>(capability: Capability<S>): Capability<S> {
  return capability;
}

export function toTool(capability: Capability): DynamicStructuredTool {
  return new DynamicStructuredTool({
    name: capability.name,
    description: capability.description,
    schema: capability.schema,
    func: async (input) => capability.invoke(capability.schema.parse(input)),
  });
}
