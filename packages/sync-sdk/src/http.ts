/**
 * Retry-After in milliseconds. Accepts delta-seconds or an HTTP date.
 */
export function parseRetryAfter(value: string | null, now: number = Date.now()): number | undefined {
  if (!value) return undefined;

  const seconds = Number(value);
  if (Number.isFinite(seconds)) {
    return seconds < 0 ? undefined : Math.round(seconds * 1000);
  }

  const at = Date.parse(value);
  if (Number.isNaN(at)) {
    return undefined;
  }

  return Math.max(0, at - now);
}

export function basicAuthHeader(username: string, password: string): string {
  return `Basic ${Buffer.from(`${username}:${password}`).toString('base64')}`;
}
