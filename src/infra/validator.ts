export type FieldRule =
  | { type: 'number'; required?: boolean; min?: number; max?: number; integer?: boolean }
  | { type: 'enum'; values: readonly string[]; required?: boolean };

/** Keys are dotted paths into nested objects, e.g. `build.maxNodes`. */
export type Schema = Record<string, FieldRule>;

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function getPath(data: Record<string, unknown>, path: string): unknown {
  let current: unknown = data;
  for (const key of path.split('.')) {
    if (!isPlainObject(current)) return undefined;
    current = current[key];
  }
  return current;
}

export function validate(data: Record<string, unknown>, schema: Schema): string[] {
  const errors: string[] = [];

  for (const [field, rule] of Object.entries(schema)) {
    const value = getPath(data, field);
    const isPresent = value !== undefined && value !== null;

    if (rule.required !== false && !isPresent) {
      errors.push(`${field} is required`);
      continue;
    }

    if (!isPresent) continue;

    switch (rule.type) {
      case 'number':
        if (typeof value !== 'number' || Number.isNaN(value)) {
          errors.push(`${field} must be a number`);
        } else {
          if (rule.integer && !Number.isInteger(value))
            errors.push(`${field} must be an integer`);
          if (rule.min !== undefined && value < rule.min)
            errors.push(`${field} must be >= ${rule.min}`);
          if (rule.max !== undefined && value > rule.max)
            errors.push(`${field} must be <= ${rule.max}`);
        }
        break;

      case 'enum':
        if (typeof value !== 'string' || !rule.values.includes(value))
          errors.push(`${field} must be one of: ${rule.values.join(', ')}`);
        break;
    }
  }

  return errors;
}
