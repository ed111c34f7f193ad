import { AbstractApi } from '../client.js';
import type { CallOptions } from '../client.js';
import { errorFactoryFor, restJsonErrorParser } from '../error-dispatch.js';
import { createLambdaError } from './errors.js';
import { InvocationRequest } from './input.js';
import type { InvocationRequestInput } from './input.js';
import { hydrateInvocationResponse } from './result.js';
import type { InvocationResponse } from './result.js';

/** Client for AWS Lambda. */
export class LambdaClient extends AbstractApi {
  protected readonly endpointPrefix = 'lambda';
  protected readonly errorFactory = errorFactoryFor(restJsonErrorParser, createLambdaError);

  /**
   * Invokes a Lambda function. A function error is not an exception: it is
   * reported through {@link InvocationResponse.functionError}.
   *
   * @throws ResourceNotFoundException
   * @throws InvalidRequestContentException
   * @throws RequestTooLargeException
   * @throws TooManyRequestsException
   * @throws KMSDisabledException
   * @throws KMSAccessDeniedException
   * @throws KMSNotFoundException
   * @throws ServiceException
   */
  async invoke(
    input: InvocationRequest | InvocationRequestInput,
    options?: CallOptions,
  ): Promise<InvocationResponse> {
    const response = await this.getResponse(InvocationRequest.create(input), 'Invoke', options);
    return hydrateInvocationResponse(response);
  }
}
