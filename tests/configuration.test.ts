import { describe, it, expect } from 'vitest';
import { DEFAULT_REGION, resolveConfiguration, resolveEndpoint } from '../src/configuration.js';

describe('resolveConfiguration', () => {
  it('should default to us-east-1 with no endpoint', () => {
    const config = resolveConfiguration({ env: {} });
    expect(config).toEqual({
      region: DEFAULT_REGION,
      endpoint: undefined,
      headers: {},
      timeout: undefined,
    });
  });

  it('should prefer explicit options over the environment', () => {
    const config = resolveConfiguration({
      region: 'eu-west-3',
      endpoint: 'http://localhost:4566',
      env: { AWS_REGION: 'us-west-2', AWS_ENDPOINT_URL: 'http://elsewhere:1' },
    });
    expect(config.region).toBe('eu-west-3');
    expect(config.endpoint).toBe('http://localhost:4566');
  });

  it('should read AWS_REGION before AWS_DEFAULT_REGION', () => {
    expect(resolveConfiguration({ env: { AWS_REGION: 'us-west-2', AWS_DEFAULT_REGION: 'us-west-1' } }).region)
      .toBe('us-west-2');
    expect(resolveConfiguration({ env: { AWS_DEFAULT_REGION: 'us-west-1' } }).region).toBe('us-west-1');
  });

  it('should treat empty values as unset', () => {
    const config = resolveConfiguration({
      region: '',
      env: { AWS_REGION: '', AWS_DEFAULT_REGION: 'ca-central-1', AWS_ENDPOINT_URL: '' },
    });
    expect(config.region).toBe('ca-central-1');
    expect(config.endpoint).toBeUndefined();
  });

  it('should copy headers', () => {
    const headers = { 'X-Team': 'billing' };
    const config = resolveConfiguration({ headers, env: {} });
    expect(config.headers).toEqual(headers);
    expect(config.headers).not.toBe(headers);
  });
});

describe('resolveEndpoint', () => {
  it('should build the public endpoint from prefix and region', () => {
    const config = resolveConfiguration({ env: {} });
    expect(resolveEndpoint(config, 'athena', 'eu-north-1')).toBe('https://athena.eu-north-1.amazonaws.com');
  });

  it('should substitute the region placeholder of an override', () => {
    const config = resolveConfiguration({ endpoint: 'https://sqs.%region%.example.test/', env: {} });
    expect(resolveEndpoint(config, 'sqs', 'eu-west-1')).toBe('https://sqs.eu-west-1.example.test');
  });

  it('should use an override without placeholder as is', () => {
    const config = resolveConfiguration({ env: { AWS_ENDPOINT_URL: 'http://localhost:4566//' } });
    expect(resolveEndpoint(config, 'lambda', 'us-east-1')).toBe('http://localhost:4566');
  });
});
