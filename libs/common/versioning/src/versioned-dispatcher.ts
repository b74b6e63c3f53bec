import { Logger } from '@nestjs/common';
import { HeaderBag } from '@todos/common/http';
import { matchesVersion } from './version-matcher';
import {
  VersionBinding,
  VersionConfigurationError,
  VersionConfigurationIssue,
  VersionedDispatcherOptions,
} from './versioning.types';

/**
 * Selects a handler group per route from the request's Accept header.
 *
 * Bindings are validated when a route is registered: at least one binding,
 * distinct version labels and exactly one default. Non-default bindings are
 * evaluated in declaration order and the default always last, so the first
 * structural match wins and the default only catches what nothing else did.
 * The table is read-only once registration is over.
 */
export class VersionedDispatcher<TGroup> {
  private readonly logger = new Logger(VersionedDispatcher.name);
  private readonly table = new Map<string, readonly VersionBinding<TGroup>[]>();

  constructor(private readonly options: VersionedDispatcherOptions = {}) {}

  /**
   * Register the ordered bindings of a route.
   * Returns the ordering issues that were tolerated; throws on anything else.
   */
  register(
    route: string,
    bindings: readonly VersionBinding<TGroup>[],
  ): VersionConfigurationIssue[] {
    if (this.table.has(route)) {
      throw new VersionConfigurationError(route, 'route is already registered');
    }
    if (bindings.length === 0) {
      throw new VersionConfigurationError(route, 'no versions declared');
    }

    const labels = new Set<string>();
    for (const binding of bindings) {
      if (labels.has(binding.version)) {
        throw new VersionConfigurationError(
          route,
          `version '${binding.version}' is declared more than once`,
        );
      }
      labels.add(binding.version);
    }

    const defaults = bindings.filter((binding) => binding.isDefault);
    if (defaults.length !== 1) {
      throw new VersionConfigurationError(
        route,
        `exactly one default version is required, found ${defaults.length}`,
      );
    }
    const [fallback] = defaults;

    const issues: VersionConfigurationIssue[] = [];
    const fallbackIndex = bindings.indexOf(fallback);
    if (fallbackIndex !== bindings.length - 1) {
      // the binding right after the default is necessarily a non-default
      const overtaken = bindings[fallbackIndex + 1];
      const message =
        `default version '${fallback.version}' is declared before ` +
        `'${overtaken.version}'; non-default versions must come first`;
      if (this.options.strictOrdering) {
        throw new VersionConfigurationError(route, message);
      }
      this.logger.warn(`${route}: ${message}`);
      issues.push({ route, version: fallback.version, message });
    }

    const ordered = [...bindings.filter((binding) => !binding.isDefault), fallback];
    this.table.set(route, Object.freeze(ordered));

    this.logger.log(
      `Registered ${route} versions: ${ordered.map((b) => b.version).join(', ')}`,
    );
    return issues;
  }

  /**
   * First binding whose version matches the request, the default otherwise.
   * Undefined only for routes that were never registered.
   */
  dispatch(route: string, headers: HeaderBag): VersionBinding<TGroup> | undefined {
    const bindings = this.table.get(route);
    if (!bindings) {
      return undefined;
    }
    return bindings.find((binding) =>
      matchesVersion(headers, binding.version, binding.isDefault),
    );
  }

  /**
   * Every binding that matches the request, in evaluation order.
   * The first entry is the dispatched binding; the rest (the default among
   * them) serve the paths its group does not declare.
   */
  candidates(route: string, headers: HeaderBag): VersionBinding<TGroup>[] {
    return this.bindingsFor(route).filter((binding) =>
      matchesVersion(headers, binding.version, binding.isDefault),
    );
  }

  /**
   * Bindings of a route in evaluation order.
   */
  bindingsFor(route: string): readonly VersionBinding<TGroup>[] {
    return this.table.get(route) ?? [];
  }

  routes(): string[] {
    return [...this.table.keys()];
  }
}
