const ADDRESS_REGEX = /^([a-z0-9-]+\.)+[a-z]{2,}$/;

export function isValidAddress(address: string): boolean {
  return ADDRESS_REGEX.test(address);
}

/**
 * Reduce a seed or peer token to a bare lowercase hostname. Accepts
 * `https://host/path`, `host:port` and a trailing root dot. The result still
 * has to pass `isValidAddress`.
 */
export function normalizeAddress(value: string): string {
  let host = value.trim().toLowerCase();
  if (host.includes('://')) {
    try {
      host = new URL(host).hostname;
    } catch {
      return host;
    }
  }
  host = host.split('/', 1)[0];
  host = host.split(':', 1)[0];
  return host.endsWith('.') ? host.slice(0, -1) : host;
}

export function hostnameOf(url: string): string | null {
  try {
    return new URL(url).hostname.toLowerCase();
  } catch {
    return null;
  }
}
