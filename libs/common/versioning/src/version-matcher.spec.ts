import { matchesVersion, mediaTypeFor } from './version-matcher';

describe('matchesVersion', () => {
  it('builds the vendor media type of a version', () => {
    expect(mediaTypeFor('v2')).toBe('application/vnd.todos.v2+json');
  });

  it('matches when the Accept header names the version', () => {
    expect(matchesVersion({ accept: 'application/vnd.todos.v2+json' }, 'v2', false)).toBe(true);
  });

  it('matches when the media type is one of several accepted types', () => {
    const headers = { accept: 'text/html, application/vnd.todos.v2+json;q=0.9' };

    expect(matchesVersion(headers, 'v2', false)).toBe(true);
  });

  it('reads the header case-insensitively', () => {
    expect(matchesVersion({ Accept: 'application/vnd.todos.v2+json' }, 'v2', false)).toBe(true);
  });

  it('falls back to the default flag when another version is requested', () => {
    const headers = { accept: 'application/vnd.todos.v2+json' };

    expect(matchesVersion(headers, 'v1', false)).toBe(false);
    expect(matchesVersion(headers, 'v1', true)).toBe(true);
  });

  it('falls back to the default flag when there is no Accept header', () => {
    expect(matchesVersion({}, 'v1', true)).toBe(true);
    expect(matchesVersion({}, 'v2', false)).toBe(false);
  });
});
