import { describe, it, expect } from 'vitest';
import {
  Provider,
  VMType,
  PROVIDER_DISPLAY_NAMES,
  SUPPORTED_PROVIDERS,
  parseProvider,
  parseVmType,
} from './provider';

describe('Provider', () => {
  it('lists the four supported providers', () => {
    expect(SUPPORTED_PROVIDERS).toEqual(['aws', 'azure', 'gcp', 'onpremise']);
  });

  it('parses provider names case-insensitively', () => {
    expect(parseProvider('AWS')).toBe('aws');
    expect(parseProvider('Azure')).toBe('azure');
    expect(parseProvider(' gcp ')).toBe('gcp');
    expect(parseProvider('OnPremise')).toBe('onpremise');
  });

  it('returns undefined for unknown providers', () => {
    expect(parseProvider('oracle')).toBeUndefined();
    expect(parseProvider('')).toBeUndefined();
  });

  it('rejects unknown providers in the schema', () => {
    expect(() => Provider.parse('digitalocean')).toThrow();
  });

  it('has a display name for every provider', () => {
    expect(PROVIDER_DISPLAY_NAMES).toEqual({
      aws: 'AWS',
      azure: 'Azure',
      gcp: 'Google Cloud',
      onpremise: 'On-Premise',
    });
  });
});

describe('VMType', () => {
  it('accepts all vm types', () => {
    const types: VMType[] = ['standard', 'memory_optimized', 'compute_optimized'];
    for (const type of types) {
      expect(VMType.parse(type)).toBe(type);
    }
  });

  it('parses vm types case-insensitively', () => {
    expect(parseVmType('MEMORY_OPTIMIZED')).toBe('memory_optimized');
    expect(parseVmType('gpu_optimized')).toBeUndefined();
  });
});
