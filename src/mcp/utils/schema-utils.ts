/**
 * Shared utility functions for MCP schema handling
 */

import { z } from 'zod';
import { McpParameterSchema, McpTool } from '../types';

/**
 * Builds the zod type of one parameter definition, recursing into array items
 * and nested object properties.
 */
function createZodTypeFromProperty(prop: McpParameterSchema): z.ZodTypeAny {
  if (prop.enum) {
    const [first, ...rest] = prop.enum;
    if (first === undefined) {
      throw new Error('Enum array cannot be empty');
    }
    return z.enum([first, ...rest]);
  }

  switch (prop.type) {
    case 'string':
      return z.string();
    case 'number':
      return z.number();
    case 'integer':
      return z.number().int();
    case 'boolean':
      return z.boolean();
    case 'array':
      return z.array(prop.items ? createZodTypeFromProperty(prop.items) : z.unknown());
    case 'object': {
      const nestedShape: Record<string, z.ZodTypeAny> = {};
      const required = prop.required ?? [];
      for (const [name, definition] of Object.entries(prop.properties ?? {})) {
        const nested = createZodTypeFromProperty(definition);
        nestedShape[name] = required.includes(name) ? nested : nested.optional();
      }
      return z.object(nestedShape).passthrough();
    }
  }
}

/**
 * Converts a tool's parameter definitions into the zod raw shape the SDK's
 * `registerTool()` takes as its input schema. Parameters not listed as required become optional.
 */
export function createZodRawShape(tool: McpTool): Record<string, z.ZodTypeAny> {
  const shape: Record<string, z.ZodTypeAny> = {};

  for (const [propName, prop] of Object.entries(tool.parameters.properties)) {
    let zodType = createZodTypeFromProperty(prop);

    if (prop.description) {
      zodType = zodType.describe(prop.description);
    }

    if (!tool.parameters.required.includes(propName)) {
      zodType = zodType.optional();
    }

    shape[propName] = zodType;
  }

  return shape;
}
