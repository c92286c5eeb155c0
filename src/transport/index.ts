/**
 * Transport exports.
 */

import { ApiError, raiseForStatus } from '../errors';
import { HttpRequest, HttpResponse, HttpTransport } from './http';

export type { HttpTransport, HttpRequest, HttpResponse, StreamingResponse } from './http';
export { AxiosTransport, splitLines } from './http';
export {
  buildChatPayload,
  normalizeMessage,
  DEFAULT_TEMPERATURE,
  DEFAULT_TOP_P,
  DEFAULT_FREQUENCY_PENALTY,
  DEFAULT_PRESENCE_PENALTY,
} from './request-builder';
export { decodeEventStream, DATA_PREFIX, DONE_SENTINEL } from './sse-decoder';

/**
 * Sends a request, classifies failures, and decodes the JSON body.
 */
export async function requestJson(
  transport: HttpTransport,
  req: HttpRequest
): Promise<{ response: HttpResponse; data: unknown }> {
  const response = await transport.request(req);
  raiseForStatus(response);

  try {
    return { response, data: JSON.parse(response.body) };
  } catch {
    throw new ApiError('Response body is not valid JSON', {
      statusCode: response.status,
      requestId: response.requestId,
    });
  }
}
