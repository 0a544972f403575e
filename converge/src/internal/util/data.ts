import { isUnknown } from "../../Unknown.ts";

export type Primitive = undefined | null | boolean | number | string;

export const isPrimitive = (value: unknown): value is Primitive =>
  value === undefined ||
  value === null ||
  typeof value === "boolean" ||
  typeof value === "number" ||
  typeof value === "string";

export const isRecord = (
  value: unknown,
): value is { readonly [key: string]: unknown } =>
  typeof value === "object" && value !== null && !Array.isArray(value);

/**
 * Structural equality over attribute trees. Object key order is ignored and
 * an {@link Unknown} never equals anything.
 */
export const deepEqual = (a: unknown, b: unknown): boolean => {
  if (isUnknown(a) || isUnknown(b)) {
    return false;
  }
  if (isPrimitive(a) || isPrimitive(b)) {
    return a === b;
  }
  if (Array.isArray(a) || Array.isArray(b)) {
    return (
      Array.isArray(a) &&
      Array.isArray(b) &&
      a.length === b.length &&
      a.every((item, i) => deepEqual(item, b[i]))
    );
  }
  if (isRecord(a) && isRecord(b)) {
    const keys = new Set([...Object.keys(a), ...Object.keys(b)]);
    for (const key of keys) {
      if (!deepEqual(a[key], b[key])) {
        return false;
      }
    }
    return true;
  }
  return false;
};

