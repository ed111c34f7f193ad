/**
 * Lambda operation inputs (restJson1 protocol).
 */

import { Input } from '../input.js';
import type { InputOptions } from '../input.js';
import { Request } from '../request.js';
import {
  assertEnumMember,
  encodePathParameter,
  requireField,
} from '../serialization.js';
import { InvocationType, LogType } from './enums.js';
import type { InvocationTypeValue, LogTypeValue } from './enums.js';

export interface InvocationRequestInput extends InputOptions {
  /**
   * Function name, version or alias: a plain name (`my-function`), a name
   * with alias (`my-function:v1`), a full or a partial ARN. Required.
   */
  functionName?: string | null;
  /** Defaults to `RequestResponse` on the service side. */
  invocationType?: InvocationTypeValue | (string & {}) | null;
  logType?: LogTypeValue | (string & {}) | null;
  /** Base64-encoded client context passed to the function (synchronous invocations only). */
  clientContext?: string | null;
  /** The JSON document handed to the function. */
  payload?: string | null;
  /** Version or alias to invoke. */
  qualifier?: string | null;
}

/** Invokes a function synchronously or asynchronously. */
export class InvocationRequest extends Input {
  functionName: string | undefined;
  invocationType: InvocationTypeValue | (string & {}) | undefined;
  logType: LogTypeValue | (string & {}) | undefined;
  clientContext: string | undefined;
  payload: string | undefined;
  qualifier: string | undefined;

  constructor(input: InvocationRequestInput = {}) {
    super(input);
    this.functionName = input.functionName ?? undefined;
    this.invocationType = input.invocationType ?? undefined;
    this.logType = input.logType ?? undefined;
    this.clientContext = input.clientContext ?? undefined;
    this.payload = input.payload ?? undefined;
    this.qualifier = input.qualifier ?? undefined;
  }

  static create(input: InvocationRequest | InvocationRequestInput): InvocationRequest {
    return input instanceof InvocationRequest ? input : new InvocationRequest(input);
  }

  request(): Request {
    const owner = 'InvocationRequest';

    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.invocationType !== undefined) {
      headers['X-Amz-Invocation-Type'] = assertEnumMember(
        InvocationType, 'InvocationType', this.invocationType, 'InvocationType', owner,
      );
    }
    if (this.logType !== undefined) {
      headers['X-Amz-Log-Type'] = assertEnumMember(LogType, 'LogType', this.logType, 'LogType', owner);
    }
    if (this.clientContext !== undefined) {
      headers['X-Amz-Client-Context'] = this.clientContext;
    }

    const query: Record<string, string> = {};
    if (this.qualifier !== undefined) {
      query['Qualifier'] = this.qualifier;
    }

    const functionName = requireField(this.functionName, 'FunctionName', owner);
    const uri = `/2015-03-31/functions/${encodePathParameter(functionName)}/invocations`;

    return new Request('POST', uri, query, headers, this.payload ?? '');
  }
}
