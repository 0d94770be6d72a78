/*
 * Identity numbers for owner objects. Held in a WeakMap so that asking for an
 * owner's number never keeps the owner alive.
 */

let nextIdentity = 0;
const identities = new WeakMap<object, number>();

/** Stable per-object number, assigned on first request. */
export function identityOf(owner: object): number {
  const existing = identities.get(owner);
  if (existing !== undefined) return existing;
  const id = ++nextIdentity;
  identities.set(owner, id);
  return id;
}

/** 32-bit FNV-1a over UTF-16 code units. */
export function hashString(value: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < value.length; i++) {
    hash ^= value.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash | 0;
}

export function combineHashes(a: number, b: number): number {
  return (Math.imul(a, 31) + b) | 0;
}
