function isPlainObject(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    Object.getPrototypeOf(value) === Object.prototype
  );
}

function canonicalise(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map((item) => canonicalise(item));
  }
  if (isPlainObject(value)) {
    const out: Record<string, unknown> = {};
    for (const key of Object.keys(value).sort()) {
      out[key] = canonicalise(value[key]);
    }
    return out;
  }
  return value;
}

/** JSON with object keys sorted at every depth; stable input for signatures. */
export function canonicalStringify(input: unknown): string {
  return JSON.stringify(canonicalise(input));
}
