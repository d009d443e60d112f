import { describe, it, expect } from 'vitest';
import {
  ConfigLoadError,
  InvalidAmountError,
  InvalidOperationError,
  ReadFailureError,
  ScratchpayError,
  UnknownNetworkError,
  WriteFailureError,
  describeCause,
} from '../errors/index.js';

describe('Error Taxonomy', () => {
  it('should give every error its own code', () => {
    const errors = [
      new InvalidOperationError('burn', ['mint']),
      new InvalidAmountError('x'),
      new UnknownNetworkError('nope', []),
      new ConfigLoadError('networks.json', 'missing'),
      new WriteFailureError('records/a.json', 'EACCES'),
      new ReadFailureError('records/a.json', 'bad json'),
    ];

    expect(errors.map((error) => error.code)).toEqual([
      'INVALID_OPERATION',
      'INVALID_AMOUNT',
      'UNKNOWN_NETWORK',
      'CONFIG_LOAD_ERROR',
      'WRITE_FAILURE',
      'READ_FAILURE',
    ]);
    for (const error of errors) {
      expect(error).toBeInstanceOf(ScratchpayError);
      expect(error).toBeInstanceOf(Error);
    }
  });

  it('should name the error class', () => {
    expect(new InvalidAmountError('x').name).toBe('InvalidAmountError');
    expect(new WriteFailureError('p', 'r').name).toBe('WriteFailureError');
  });

  it('should describe an unknown network without profiles', () => {
    expect(new UnknownNetworkError('nope', []).message).toBe(
      "Unknown network 'nope'. No network profiles are loaded"
    );
  });

  it('should keep the cause', () => {
    const cause = new Error('disk full');
    const error = new WriteFailureError('records/a.json', describeCause(cause), { cause });
    expect(error.cause).toBe(cause);
    expect(error.message).toBe("Cannot write 'records/a.json': disk full");
  });

  it('should describe non-error causes', () => {
    expect(describeCause('boom')).toBe('boom');
  });
});
