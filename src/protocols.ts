/**
 * Request builders shared by the services speaking the same wire protocol.
 */

import { Request } from './request.js';
import { encodeJsonBody } from './serialization.js';
import type { JsonObject } from './json.js';

export type AwsJsonVersion = '1.0' | '1.1';

/**
 * Build a JSON-RPC style request: every operation is a POST to `/`, selected
 * by the `X-Amz-Target` header.
 */
export function awsJsonRequest(
  version: AwsJsonVersion,
  target: string,
  payload: JsonObject,
): Request {
  return new Request(
    'POST',
    '/',
    {},
    {
      'Content-Type': `application/x-amz-json-${version}`,
      'X-Amz-Target': target,
      'Accept': 'application/json',
    },
    encodeJsonBody(payload),
  );
}
