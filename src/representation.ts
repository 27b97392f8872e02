/** Output representations, in the order they are listed and printed. */
export const REPRESENTATIONS = ['plain', 'unicode', 'html', 'latex'] as const;

export type Representation = (typeof REPRESENTATIONS)[number];

export function isRepresentation(value: string): value is Representation {
  return (REPRESENTATIONS as readonly string[]).includes(value);
}

/**
 * Resolve a representation name case-insensitively, so `PLAIN`, `Plain`
 * and `plain` all name the same representation.
 */
export function parseRepresentation(value: string): Representation {
  const normalized = value.trim().toLowerCase();
  if (isRepresentation(normalized)) {
    return normalized;
  }
  throw new Error(`Invalid representation "${value}". Use plain, unicode, html, or latex`);
}
