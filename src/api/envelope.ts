import { ResponseEnvelope } from '../tools/types.js';
import { HemisEnvelope } from '../types.js';
import { isRecord } from '../utils.js';
import { QueryValue } from './transport.js';

export function isHemisEnvelope(body: unknown): body is HemisEnvelope {
  return isRecord(body) && typeof body.success === 'boolean';
}

/**
 * The upstream's own explanation of a failure, formatted for appending to a
 * message (": <text>"), or an empty string when it gave none.
 */
export function upstreamMessage(body: unknown): string {
  if (!isRecord(body)) {
    return '';
  }
  const message = body.error ?? body.message;
  return typeof message === 'string' && message !== '' ? `: ${message}` : '';
}

/**
 * Unwrap a successful response body according to the endpoint's envelope.
 * Objects and lists come out of `data` untouched. A paginated endpoint that
 * answers with a bare array gets its page and limit attached from the request.
 */
export function unwrapPayload(
  envelope: ResponseEnvelope,
  body: unknown,
  params: Record<string, QueryValue> = {}
): unknown {
  const data = isHemisEnvelope(body) ? body.data : body;

  if (envelope.kind !== 'paginated' || !Array.isArray(data)) {
    return data;
  }

  const pagination: Record<string, QueryValue> = {};
  if (envelope.pageParam && params[envelope.pageParam] !== undefined) {
    pagination.page = params[envelope.pageParam];
  }
  if (envelope.limitParam && params[envelope.limitParam] !== undefined) {
    pagination.limit = params[envelope.limitParam];
  }
  return {
    [envelope.itemsKey]: data,
    [envelope.paginationKey]: pagination,
  };
}
