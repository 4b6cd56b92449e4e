import { keccak256, toUtf8Bytes } from "ethers";

/**
 * JSON with object keys in sorted order and undefined members left out, so
 * equal values always encode to the same bytes.
 */
export function canonicalEncode(value: unknown): string {
  return JSON.stringify(value, (_key, member: unknown) => {
    if (typeof member !== "object" || member === null || Array.isArray(member)) {
      return member;
    }
    const fields = new Map(Object.entries(member));
    const ordered: Record<string, unknown> = {};
    for (const key of [...fields.keys()].sort()) {
      const field: unknown = fields.get(key);
      if (field !== undefined) ordered[key] = field;
    }
    return ordered;
  });
}

export function hashValue(value: unknown): string {
  return keccak256(toUtf8Bytes(canonicalEncode(value)));
}

/** Next head of a hash chain: keccak256(head ++ canonical(link)). */
export function linkHash(head: string, link: unknown): string {
  return keccak256(toUtf8Bytes(head + canonicalEncode(link)));
}
