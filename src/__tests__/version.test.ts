import { describe, it, expect } from 'vitest';
import { acceptsVersion, fetchMinimumVersion, minimumAcceptableVersion } from '../utils/version.js';
import { StartupError } from '../utils/errors.js';

describe('minimumAcceptableVersion', () => {
  it('goes back one minor release', () => {
    expect(minimumAcceptableVersion('0.19.5')).toBe('0.18.5');
    expect(minimumAcceptableVersion('1.3.0')).toBe('1.2.0');
  });

  it('falls back to the previous major line on a .0 minor', () => {
    expect(minimumAcceptableVersion('1.0.2')).toBe('0.0.0');
    expect(minimumAcceptableVersion('2.0.1')).toBe('1.0.0');
  });

  it('bottoms out at 0.0.0', () => {
    expect(minimumAcceptableVersion('0.0.4')).toBe('0.0.0');
  });

  it('ignores surrounding whitespace', () => {
    expect(minimumAcceptableVersion(' 0.19.5\n')).toBe('0.18.5');
  });

  it('throws a StartupError on garbage', () => {
    expect(() => minimumAcceptableVersion('latest')).toThrow(StartupError);
  });
});

describe('acceptsVersion', () => {
  it('compares against the minimum', () => {
    expect(acceptsVersion('0.19.3', '0.18.5')).toBe(true);
    expect(acceptsVersion('0.18.5', '0.18.5')).toBe(true);
    expect(acceptsVersion('0.18.4', '0.18.5')).toBe(false);
  });

  it('orders prereleases by their release line', () => {
    expect(acceptsVersion('0.19.0-rc.1', '0.18.5')).toBe(true);
  });

  it('rejects versions that do not parse', () => {
    expect(acceptsVersion('unknown', '0.0.0')).toBe(false);
  });
});

describe('fetchMinimumVersion', () => {
  it('derives the minimum from the published text', async () => {
    const source = { getText: async () => '0.19.5\n' };
    await expect(fetchMinimumVersion(source, 'https://versions.example/VERSION')).resolves.toBe('0.18.5');
  });

  it('wraps fetch failures in a StartupError', async () => {
    const source = {
      getText: async (): Promise<string> => {
        throw new Error('connect ECONNREFUSED');
      },
    };
    await expect(fetchMinimumVersion(source, 'https://versions.example/VERSION')).rejects.toThrow(
      'Failed to fetch published version from https://versions.example/VERSION: connect ECONNREFUSED'
    );
  });
});
