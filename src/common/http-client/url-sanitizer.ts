const SECRET_PARAM_KEYS = [
  'api_key',
  'apikey',
  'apiKey',
  'token',
  'access_token',
  'auth',
  'key',
  'password',
  'secret',
];

/**
 * Drops credentials and redacts secret-looking query parameters so that
 * source and proxy URLs can be logged.
 */
export function sanitizeUrlForLogging(url: string): string {
  try {
    const urlObj = new URL(url);
    for (const key of SECRET_PARAM_KEYS) {
      if (urlObj.searchParams.has(key)) {
        urlObj.searchParams.set(key, 'REDACTED');
      }
    }
    const query = urlObj.searchParams.toString();
    return `${urlObj.origin}${urlObj.pathname}${query ? `?${query}` : ''}`;
  } catch {
    return '[invalid-url]';
  }
}
