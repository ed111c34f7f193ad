import { AbstractApi } from '../client.js';
import type { CallOptions } from '../client.js';
import { awsJsonErrorParser, errorFactoryFor } from '../error-dispatch.js';
import { createAthenaError } from './errors.js';
import { GetSessionRequest, ListSessionsRequest, StartSessionRequest } from './input.js';
import type {
  GetSessionRequestInput,
  ListSessionsRequestInput,
  StartSessionRequestInput,
} from './input.js';
import {
  hydrateGetSessionResponse,
  hydrateListSessionsResponse,
  hydrateStartSessionResponse,
} from './result.js';
import type {
  GetSessionResponse,
  ListSessionsResponse,
  StartSessionResponse,
} from './result.js';

/** Client for Amazon Athena's Spark session operations. */
export class AthenaClient extends AbstractApi {
  protected readonly endpointPrefix = 'athena';
  protected readonly errorFactory = errorFactoryFor(awsJsonErrorParser, createAthenaError);

  /**
   * @throws InternalServerException
   * @throws InvalidRequestException
   * @throws ResourceNotFoundException
   * @throws SessionAlreadyExistsException
   * @throws TooManyRequestsException
   */
  async startSession(
    input: StartSessionRequest | StartSessionRequestInput,
    options?: CallOptions,
  ): Promise<StartSessionResponse> {
    const response = await this.getResponse(StartSessionRequest.create(input), 'StartSession', options);
    return hydrateStartSessionResponse(response.toArray());
  }

  /**
   * @throws InternalServerException
   * @throws InvalidRequestException
   * @throws ResourceNotFoundException
   */
  async getSession(
    input: GetSessionRequest | GetSessionRequestInput,
    options?: CallOptions,
  ): Promise<GetSessionResponse> {
    const response = await this.getResponse(GetSessionRequest.create(input), 'GetSession', options);
    return hydrateGetSessionResponse(response.toArray());
  }

  /**
   * Returns one page; pass `nextToken` back in to fetch the next.
   *
   * @throws InternalServerException
   * @throws InvalidRequestException
   * @throws ResourceNotFoundException
   */
  async listSessions(
    input: ListSessionsRequest | ListSessionsRequestInput,
    options?: CallOptions,
  ): Promise<ListSessionsResponse> {
    const response = await this.getResponse(ListSessionsRequest.create(input), 'ListSessions', options);
    return hydrateListSessionsResponse(response.toArray());
  }
}
