import { HttpMethod } from '../api/transport.js';

export type ParameterLocation = 'query' | 'path' | 'body';

export type ParameterType = 'string' | 'integer';

export interface ParameterSpec {
  name: string;
  // Name sent to HEMIS when it differs from the tool-facing name.
  wireName?: string;
  type: ParameterType;
  required: boolean;
  location: ParameterLocation;
  default?: string | number;
  description: string;
}

export interface PaginatedEnvelope {
  kind: 'paginated';
  itemsKey: string;
  paginationKey: string;
  // Parameters describing the requested page, used when HEMIS answers with a bare array.
  pageParam?: string;
  limitParam?: string;
}

export type ResponseEnvelope = { kind: 'object' } | { kind: 'list' } | PaginatedEnvelope;

export interface EndpointSpec {
  name: string;
  description: string;
  method: HttpMethod;
  // Relative to the HEMIS base URL; `{name}` marks a path parameter.
  path: string;
  parameters: ParameterSpec[];
  envelope: ResponseEnvelope;
  authenticated: boolean;
  // Mutating endpoints are never re-sent automatically.
  mutating: boolean;
}
