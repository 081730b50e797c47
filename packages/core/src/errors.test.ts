import { describe, it, expect } from 'vitest';
import {
  InternalError,
  NotFoundError,
  ProvisioningError,
  ProvisioningErrorType,
  ValidationError,
  isExpectedError,
  isProvisioningError,
  toErrorMessage,
} from './errors';

describe('Provisioning errors', () => {
  it('tags each subclass with its type', () => {
    expect(new ValidationError('bad').type).toBe(ProvisioningErrorType.VALIDATION);
    expect(new NotFoundError('missing').type).toBe(ProvisioningErrorType.NOT_FOUND);
    expect(new InternalError('oops').type).toBe(ProvisioningErrorType.INTERNAL);
  });

  it('keeps suggestions and the original error', () => {
    const cause = new Error('disk exploded');
    const internal = new InternalError('Internal error', cause);
    expect(internal.originalError).toBe(cause);

    const validation = new ValidationError('bad flavor', ['Use small']);
    expect(validation.suggestions).toEqual(['Use small']);
    expect(validation).toBeInstanceOf(ProvisioningError);
    expect(validation.name).toBe('ValidationError');
  });

  it('classifies expected errors', () => {
    expect(isExpectedError(new ValidationError('x'))).toBe(true);
    expect(isExpectedError(new NotFoundError('x'))).toBe(true);
    expect(isExpectedError(new InternalError('x'))).toBe(false);
    expect(isExpectedError(new Error('x'))).toBe(false);
    expect(isProvisioningError(new InternalError('x'))).toBe(true);
  });

  it('normalizes thrown values to messages', () => {
    expect(toErrorMessage(new Error('boom'))).toBe('boom');
    expect(toErrorMessage('plain')).toBe('plain');
    expect(toErrorMessage(42)).toBe('42');
  });
});
