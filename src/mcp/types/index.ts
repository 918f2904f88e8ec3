/**
 * MCP tool definition types.
 * See: https://modelcontextprotocol.io
 */

/**
 * JSON-schema-like description of one tool parameter. Arrays describe their
 * items and objects their properties, recursively.
 */
export interface McpParameterSchema {
  type: 'string' | 'number' | 'integer' | 'boolean' | 'array' | 'object';
  description?: string;
  title?: string;
  enum?: string[];
  items?: McpParameterSchema;
  properties?: Record<string, McpParameterSchema>;
  required?: string[];
}

/**
 * Base interface for all MCP tools
 */
export interface McpTool {
  name: string;
  description: string;
  parameters: {
    type: 'object';
    properties: Record<string, McpParameterSchema>;
    required: string[];
  };
  returns: {
    type: string;
    description?: string;
    properties?: Record<string, McpParameterSchema>;
  };
  annotations: {
    title: string;
    readOnlyHint: boolean;
    destructiveHint: boolean;
    idempotentHint: boolean;
    openWorldHint: boolean;
  };
}
