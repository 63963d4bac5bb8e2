/**
 * Cookie jar helpers
 *
 * Native fetch keeps no cookies between requests, so the session carries a
 * `Cookie` header string and folds every `Set-Cookie` it sees into it.
 */

/**
 * Extract `name=value` pairs from the Set-Cookie headers of a response
 */
export function parseSetCookies(headers: Headers): Map<string, string> {
  const cookies = new Map<string, string>();
  for (const header of headers.getSetCookie()) {
    const [pair] = header.split(';');
    const eq = pair.indexOf('=');
    if (eq <= 0) continue;
    const name = pair.slice(0, eq).trim();
    const value = pair.slice(eq + 1).trim();
    cookies.set(name, value);
  }
  return cookies;
}

/**
 * Merge new cookies into an existing Cookie header, newest value wins
 */
export function mergeCookies(existing: string, incoming: Map<string, string>): string {
  const cookieMap = new Map<string, string>();

  for (const cookie of existing.split(';').map(c => c.trim()).filter(c => c)) {
    const eq = cookie.indexOf('=');
    if (eq <= 0) continue;
    cookieMap.set(cookie.slice(0, eq), cookie.slice(eq + 1));
  }

  for (const [name, value] of incoming) {
    // an emptied cookie is the server deleting it
    if (value === '') {
      cookieMap.delete(name);
    } else {
      cookieMap.set(name, value);
    }
  }

  return Array.from(cookieMap.entries()).map(([k, v]) => `${k}=${v}`).join('; ');
}
