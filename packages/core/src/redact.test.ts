import { describe, it, expect } from 'vitest';
import { isSensitiveKey, redactParams, REDACTED_VALUE } from './redact';

describe('redactParams', () => {
  it('detects sensitive keys case-insensitively', () => {
    expect(isSensitiveKey('password')).toBe(true);
    expect(isSensitiveKey('API_TOKEN')).toBe(true);
    expect(isSensitiveKey('clientSecret')).toBe(true);
    expect(isSensitiveKey('keyPairName')).toBe(true);
    expect(isSensitiveKey('region')).toBe(false);
  });

  it('masks sensitive values and keeps the rest', () => {
    expect(redactParams({ region: 'us-east-1', password: 'test-secret' })).toEqual({
      region: 'us-east-1',
      password: REDACTED_VALUE,
    });
  });

  it('walks nested maps and arrays', () => {
    const params = {
      vm_params: { ami: 'ami-1', token: 'test-token' },
      disks: [{ secret: 'x', sizeGB: 20 }],
    };
    expect(redactParams(params)).toEqual({
      vm_params: { ami: 'ami-1', token: '***' },
      disks: [{ secret: '***', sizeGB: 20 }],
    });
  });

  it('does not modify the input', () => {
    const params = { password: 'test-secret' };
    redactParams(params);
    expect(params.password).toBe('test-secret');
  });
});
