import { describe, expect, it } from '@jest/globals';
import { claimGuid, isGuid, makeGuid } from './guid';

const EXISTING = '3f2c9a10-7b4e-4d21-9c55-0a1b2c3d4e5f';

describe('guid helpers', () => {
  it('accepts 36 hex-and-hyphen characters', () => {
    expect(isGuid(EXISTING)).toBe(true);
    expect(isGuid(EXISTING.toUpperCase())).toBe(true);
    expect(isGuid(makeGuid())).toBe(true);
  });

  it('rejects legacy ids', () => {
    expect(isGuid('sq_1a2b3c4d')).toBe(false);
    expect(isGuid(12)).toBe(false);
    expect(isGuid(undefined)).toBe(false);
    expect(isGuid(`${EXISTING}0`)).toBe(false);
  });

  it('keeps a canonical candidate and records it', () => {
    const seen = new Set<string>();
    expect(claimGuid(EXISTING, seen)).toEqual({ id: EXISTING, minted: false });
    expect(seen.has(EXISTING)).toBe(true);
  });

  it('mints when the candidate is missing, malformed or already taken', () => {
    const seen = new Set<string>([EXISTING]);
    const taken = claimGuid(EXISTING, seen);
    const malformed = claimGuid(1, seen);

    expect(taken.minted).toBe(true);
    expect(taken.id).not.toBe(EXISTING);
    expect(malformed.minted).toBe(true);
    expect(isGuid(malformed.id)).toBe(true);
    expect(seen.size).toBe(3);
  });
});
