/** Recursively Object.freeze plain objects and arrays. Returns its argument. */
export function deepFreeze<T>(value: T): T {
  if (value === null || typeof value !== "object" || Object.isFrozen(value)) return value;
  const children: unknown[] = Object.values(value);
  for (const child of children) deepFreeze(child);
  Object.freeze(value);
  return value;
}
