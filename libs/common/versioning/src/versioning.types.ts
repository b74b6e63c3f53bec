/**
 * API version declarations
 */

export interface ApiVersionSpec {
  readonly version: string; // e.g. "v1"
  readonly isDefault: boolean;
}

/**
 * A declared version together with the handler group that serves it.
 */
export interface VersionBinding<TGroup> extends ApiVersionSpec {
  readonly group: TGroup;
}

export interface VersionConfigurationIssue {
  readonly route: string;
  readonly version: string;
  readonly message: string;
}

export interface VersionedDispatcherOptions {
  /**
   * Reject a default declared ahead of a non-default version instead of
   * reporting it as an issue.
   */
  strictOrdering?: boolean;
}

export class VersionConfigurationError extends Error {
  constructor(
    readonly route: string,
    message: string,
  ) {
    super(`Invalid API version configuration for '${route}': ${message}`);
    this.name = 'VersionConfigurationError';
  }
}
