import { describe, it, expect } from 'vitest';
import { GameError } from './errors';

describe('GameError', () => {
  it('carries a code and optional context', () => {
    const err = new GameError('INVALID_CONFIG', 'speed must be a positive number (got 0)', { field: 'speed' });
    expect(err).toBeInstanceOf(Error);
    expect(err.name).toBe('GameError');
    expect(err.code).toBe('INVALID_CONFIG');
    expect(err.message).toBe('speed must be a positive number (got 0)');
    expect(err.context).toEqual({ field: 'speed' });
  });

  it('leaves context undefined when none is given', () => {
    expect(new GameError('INVARIANT_VIOLATION', 'snake has no segments').context).toBeUndefined();
  });
});
