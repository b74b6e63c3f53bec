import { VersionedDispatcher } from '@todos/common/versioning';
import { toHeaderBag } from '@todos/common/http';

/**
 * Nest custom-versioning extractor backed by the dispatcher.
 *
 * The route key is the first path segment. The dispatched version comes
 * first, followed by the later matches, so a path the selected group does
 * not serve falls through to the default group. Routes the dispatcher does
 * not know (signup, login, health) are unversioned and ignore the result.
 */
export function createVersionExtractor<TGroup>(
  dispatcher: VersionedDispatcher<TGroup>,
): (request: unknown) => string[] {
  return (request: unknown) => {
    if (typeof request !== 'object' || request === null) {
      return [];
    }
    if (!('path' in request) || typeof request.path !== 'string') {
      return [];
    }
    if (!('headers' in request) || typeof request.headers !== 'object' || request.headers === null) {
      return [];
    }

    return dispatcher
      .candidates(routeKey(request.path), toHeaderBag(request.headers))
      .map((binding) => binding.version);
  };
}

export function routeKey(path: string): string {
  return path.split('/').find((segment) => segment.length > 0) ?? '';
}
