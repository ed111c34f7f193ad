import { describe, it, expect } from 'vitest';
import { Request } from '../src/request.js';
import { Response } from '../src/response.js';
import { ClientError, MalformedResponseError, ServerError } from '../src/errors.js';

describe('Request', () => {
  it('resolves the URL against an endpoint', () => {
    const request = new Request('GET', '/2015-03-31/functions/f/invocations', {}, {}, '');
    expect(request.getUrl('https://lambda.us-east-1.amazonaws.com/')).toBe(
      'https://lambda.us-east-1.amazonaws.com/2015-03-31/functions/f/invocations',
    );
  });

  it('appends the query string when there is one', () => {
    const request = new Request('POST', '/p', { Qualifier: 'v 1', Other: 'a&b' }, {}, '');
    expect(request.getUrl('http://localhost:4566')).toBe(
      'http://localhost:4566/p?Qualifier=v+1&Other=a%26b',
    );
  });
});

describe('Response', () => {
  const url = 'https://athena.us-east-1.amazonaws.com/';
  const factory = (r: Response) =>
    r.status >= 500 ? new ServerError(r, {}) : new ClientError(r, {});

  it('looks up headers case-insensitively', () => {
    const response = new Response({ status: 200, headers: { 'X-Amz-Log-Result': 'bG9n' }, body: '' }, url, factory);
    expect(response.getHeader('x-amz-log-result')).toBe('bG9n');
    expect(response.getHeader('X-AMZ-LOG-RESULT')).toBe('bG9n');
    expect(response.getHeaders()).toEqual({ 'x-amz-log-result': 'bG9n' });
  });

  it('parses a JSON object body', () => {
    const response = new Response({ status: 200, headers: {}, body: '{"SessionId":"s-1"}' }, url, factory);
    expect(response.isSuccessful()).toBe(true);
    expect(response.toArray()).toEqual({ SessionId: 's-1' });
  });

  it('reads an empty body as an empty object', () => {
    const response = new Response({ status: 200, headers: {}, body: '' }, url, factory);
    expect(response.toArray()).toEqual({});
  });

  it('rejects bodies that are not a JSON object', () => {
    const invalid = new Response({ status: 200, headers: {}, body: '<html>' }, url, factory);
    expect(() => invalid.toArray()).toThrow(`Response body from "${url}" is not valid JSON.`);

    const list = new Response({ status: 200, headers: {}, body: '[1,2]' }, url, factory);
    expect(() => list.toArray()).toThrow(MalformedResponseError);
    expect(() => list.toArray()).toThrow(`Response body from "${url}" is not a JSON object.`);
  });

  it('throws the factory error on a non-2xx status', () => {
    const response = new Response({ status: 503, headers: {}, body: '{}' }, url, factory);
    expect(response.isSuccessful()).toBe(false);
    expect(() => response.checkStatus()).toThrow(ServerError);
    expect(() => response.toArray()).toThrow(ServerError);
    expect(() => response.getContent()).toThrow(ServerError);
  });

  it('skips the status check when asked', () => {
    const response = new Response({ status: 400, headers: {}, body: '{"message":"no"}' }, url, factory);
    expect(response.toArray(false)).toEqual({ message: 'no' });
    expect(response.getContent(false)).toBe('{"message":"no"}');
  });
});
