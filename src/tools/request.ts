import { InvalidArgumentsError } from '../errors.js';
import { QueryValue, TransportRequest } from '../api/transport.js';
import { ToolArguments } from '../types.js';
import { EndpointSpec, ParameterSpec } from './types.js';

export type EndpointRequest = Omit<TransportRequest, 'headers'>;

/**
 * Turn tool arguments into an upstream request as the endpoint spec declares:
 * path parameters are substituted, query parameters go to the query string
 * and body parameters to a JSON body. Arguments the spec does not declare
 * are ignored.
 */
export function buildRequest(spec: EndpointSpec, args: ToolArguments): EndpointRequest {
  let path = spec.path;
  const params: Record<string, QueryValue> = {};
  const body: Record<string, unknown> = {};

  for (const param of spec.parameters) {
    const value = resolveValue(spec, param, args[param.name]);
    if (value === undefined) {
      continue;
    }

    const wireName = param.wireName ?? param.name;
    switch (param.location) {
      case 'path':
        path = path.replace(`{${param.name}}`, encodeURIComponent(String(value)));
        break;
      case 'query':
        params[wireName] = value;
        break;
      case 'body':
        body[wireName] = value;
        break;
    }
  }

  return {
    method: spec.method,
    path,
    ...(Object.keys(params).length > 0 ? { params } : {}),
    ...(Object.keys(body).length > 0 ? { data: body } : {}),
    retryable: !spec.mutating,
  };
}

function resolveValue(
  spec: EndpointSpec,
  param: ParameterSpec,
  raw: unknown
): string | number | undefined {
  if (raw === undefined || raw === null || (typeof raw === 'string' && raw.trim() === '')) {
    if (param.required) {
      throw new InvalidArgumentsError(
        `Missing required parameter '${param.name}' for tool '${spec.name}'`
      );
    }
    return param.default;
  }

  if (param.type === 'integer') {
    if (typeof raw === 'number' && Number.isInteger(raw)) {
      return raw;
    }
    if (typeof raw === 'string' && /^-?\d+$/.test(raw.trim())) {
      return Number(raw.trim());
    }
    throw new InvalidArgumentsError(
      `Parameter '${param.name}' for tool '${spec.name}' must be an integer`
    );
  }

  if (typeof raw === 'string') {
    return raw.trim();
  }
  if (typeof raw === 'number' && Number.isFinite(raw)) {
    return String(raw);
  }
  throw new InvalidArgumentsError(
    `Parameter '${param.name}' for tool '${spec.name}' must be a string or number`
  );
}
