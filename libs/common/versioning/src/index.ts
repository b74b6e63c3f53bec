export { ApiVersioningModule, ApiVersioningOptions } from './versioning.module';
export { VersionedDispatcher } from './versioned-dispatcher';
export { matchesVersion, mediaTypeFor } from './version-matcher';
export {
  ApiVersionSpec,
  VersionBinding,
  VersionConfigurationError,
  VersionConfigurationIssue,
  VersionedDispatcherOptions,
} from './versioning.types';
