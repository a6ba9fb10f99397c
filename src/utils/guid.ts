// src/utils/guid.ts

import { v4 as uuidv4 } from "uuid";

// Any 36 chars of hex digits and hyphens; stored ids were accepted by this
// same pattern and must keep matching it.
export const GUID_PATTERN = /^[0-9a-fA-F-]{36}$/;

export const isGuid = (value: unknown): value is string =>
  typeof value === "string" && GUID_PATTERN.test(value);

export const makeGuid = (): string => uuidv4();

/**
 * Keeps `candidate` when it is a GUID not yet taken in `seen`, otherwise mints
 * a fresh one. The returned id is recorded in `seen`.
 */
export function claimGuid(
  candidate: unknown,
  seen: Set<string>
): { id: string; minted: boolean } {
  if (isGuid(candidate) && !seen.has(candidate)) {
    seen.add(candidate);
    return { id: candidate, minted: false };
  }
  const id = makeGuid();
  seen.add(id);
  return { id, minted: true };
}
