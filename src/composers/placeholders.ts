const PLACEHOLDER = /\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

/** Distinct `{field}` names in order of first appearance. */
export function listPlaceholders(...texts: string[]): string[] {
  const names = new Set<string>();
  for (const text of texts) {
    for (const match of text.matchAll(PLACEHOLDER)) names.add(match[1]);
  }
  return [...names];
}

/** Substitute known fields; unknown markers stay as written. */
export function fillPlaceholders(
  text: string,
  fields: Readonly<Record<string, string>>
): string {
  return text.replace(PLACEHOLDER, (marker, name: string) =>
    Object.hasOwn(fields, name) ? fields[name] : marker
  );
}
