/**
 * Builds the stored document for an entity: `key` becomes `_id`, undefined
 * optionals are left out instead of being persisted as null.
 */
export function toDocument<T extends object, K extends keyof T>(entity: T, key: K): Record<string, unknown> {
  const document: Record<string, unknown> = { _id: entity[key] };
  for (const [field, value] of Object.entries(entity)) {
    if (field !== key && value !== undefined) {
      document[field] = value;
    }
  }
  return document;
}

export function escapeRegex(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
