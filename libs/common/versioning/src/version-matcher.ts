import { HeaderBag, readHeader } from '@todos/common/http';

export function mediaTypeFor(version: string): string {
  return `application/vnd.todos.${version}+json`;
}

/**
 * True when the Accept header names the version's vendor media type.
 * Otherwise (including a missing Accept header) the default flag decides.
 */
export function matchesVersion(
  headers: HeaderBag,
  version: string,
  isDefault: boolean,
): boolean {
  const accept = readHeader(headers, 'accept');
  if (accept !== undefined && accept.includes(mediaTypeFor(version))) {
    return true;
  }
  return isDefault;
}
