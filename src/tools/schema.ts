import { EndpointSpec } from './types.js';

export interface JsonSchemaProperty {
  type: 'string' | 'integer';
  description: string;
  default?: string | number;
}

export interface ToolInputSchema {
  type: 'object';
  properties: Record<string, JsonSchemaProperty>;
  required: string[];
}

/**
 * JSON Schema for a tool's arguments, as advertised to MCP clients.
 */
export function toInputSchema(spec: EndpointSpec): ToolInputSchema {
  const properties: Record<string, JsonSchemaProperty> = {};
  for (const param of spec.parameters) {
    properties[param.name] = {
      type: param.type,
      description: param.description,
      ...(param.default !== undefined ? { default: param.default } : {}),
    };
  }
  return {
    type: 'object',
    properties,
    required: spec.parameters.filter(param => param.required).map(param => param.name),
  };
}
