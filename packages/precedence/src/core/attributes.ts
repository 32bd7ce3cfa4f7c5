import type { AttributeMap } from '../types/index.js';

/**
 * Shared empty attribute map. Read-only by type only; never mutate it.
 */
export const EMPTY_ATTRIBUTES: AttributeMap = new Map<string, unknown>();

/**
 * Merge two attribute maps into a new one.
 *
 * Keys present in both take the `overlay` value; neither input is modified.
 * Passing `undefined` for either side treats it as empty.
 */
export function mergeAttributes(
  base: AttributeMap | undefined,
  overlay: AttributeMap | undefined
): AttributeMap {
  const merged = new Map<string, unknown>(base ?? EMPTY_ATTRIBUTES);
  if (overlay) {
    for (const [key, value] of overlay) merged.set(key, value);
  }
  return merged;
}

/**
 * Convert an attribute map into a plain record, mostly for diagnostics and
 * assertions.
 */
export function attributesToRecord(attributes: AttributeMap): Record<string, unknown> {
  return Object.fromEntries(attributes);
}
