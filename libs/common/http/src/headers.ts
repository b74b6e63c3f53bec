/**
 * Header access shared by the authorization and versioning layers.
 * Keys are lower-case, as Node delivers them.
 */

export type HeaderValue = string | readonly string[] | undefined;

export type HeaderBag = Readonly<Record<string, HeaderValue>>;

/**
 * Returns a header's value, joining repeated headers with ", ".
 * Lookup is case-insensitive.
 */
export function readHeader(headers: HeaderBag, name: string): string | undefined {
  const wanted = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() !== wanted || value === undefined) {
      continue;
    }
    return typeof value === 'string' ? value : value.join(', ');
  }
  return undefined;
}

/**
 * Copies the string-valued entries of an arbitrary headers object.
 */
export function toHeaderBag(headers: object): HeaderBag {
  const bag: Record<string, HeaderValue> = {};
  for (const [key, value] of Object.entries(headers)) {
    if (typeof value === 'string') {
      bag[key] = value;
    } else if (Array.isArray(value)) {
      bag[key] = value.filter((part): part is string => typeof part === 'string');
    }
  }
  return bag;
}
