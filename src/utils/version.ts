import semver from 'semver';
import { StartupError, describeError } from './errors.js';

export interface TextSource {
  getText(url: string): Promise<string>;
}

/**
 * Minimum version an instance must report to be crawled. One minor release
 * behind the published version, so the network is not rejected wholesale
 * right after a release. For `x.0.y` it falls back to the start of the
 * previous major line.
 */
export function minimumAcceptableVersion(published: string): string {
  const parsed = semver.parse(published.trim());
  if (!parsed) {
    throw new StartupError(`Published version "${published.trim()}" is not a valid semantic version`);
  }

  if (parsed.minor > 0) {
    return `${parsed.major}.${parsed.minor - 1}.${parsed.patch}`;
  }
  if (parsed.major > 0) {
    return `${parsed.major - 1}.0.0`;
  }
  return '0.0.0';
}

export function acceptsVersion(reported: string, minimum: string): boolean {
  const parsed = semver.parse(reported.trim());
  if (!parsed) return false;
  return semver.gte(parsed, minimum);
}

export async function fetchMinimumVersion(source: TextSource, url: string): Promise<string> {
  let body: string;
  try {
    body = await source.getText(url);
  } catch (error) {
    throw new StartupError(`Failed to fetch published version from ${url}: ${describeError(error)}`, {
      cause: error,
    });
  }
  return minimumAcceptableVersion(body);
}
