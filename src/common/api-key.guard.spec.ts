import { UnauthorizedException } from '@nestjs/common';
import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host';
import { API_KEY_HEADER, ApiKeyGuard } from './api-key.guard';
import { createTestConfig } from '../testing/test-config';

const contextWith = (headers: Record<string, string>) =>
  new ExecutionContextHost([{ method: 'GET', url: '/students', headers }]);

describe('ApiKeyGuard', () => {
  it('lets requests with the configured key through', () => {
    const guard = new ApiKeyGuard(createTestConfig({ ADMIN_API_KEY: 'test-secret' }));

    expect(guard.canActivate(contextWith({ [API_KEY_HEADER]: 'test-secret' }))).toBe(true);
  });

  it('refuses a wrong or missing key', () => {
    const guard = new ApiKeyGuard(createTestConfig({ ADMIN_API_KEY: 'test-secret' }));

    expect(() => guard.canActivate(contextWith({ [API_KEY_HEADER]: 'test-secreT' }))).toThrow(
      new UnauthorizedException('Invalid API key'),
    );
    expect(() => guard.canActivate(contextWith({ [API_KEY_HEADER]: 'short' }))).toThrow('Invalid API key');
    expect(() => guard.canActivate(contextWith({}))).toThrow('Invalid API key');
  });

  it('refuses everything when no key is configured', () => {
    const guard = new ApiKeyGuard(createTestConfig());

    expect(() => guard.canActivate(contextWith({ [API_KEY_HEADER]: '' }))).toThrow('Admin API is disabled');
  });
});
