/**
 * Parses an RFC 8288 `Link` header into a rel → url map.
 *
 * `<https://api.github.com/...&page=2>; rel="next", <...>; rel="last"`
 */
export function parseLinkHeader(value: string | null): Map<string, string> {
  const links = new Map<string, string>();
  if (value === null) return links;

  for (const part of value.split(',')) {
    const [target, ...params] = part.split(';').map((s) => s.trim());
    const url = target?.match(/^<(.+)>$/)?.[1];
    if (url === undefined) continue;

    for (const param of params) {
      const rel = param.match(/^rel="?([^"]+)"?$/)?.[1];
      if (rel === undefined) continue;
      for (const name of rel.split(/\s+/)) {
        links.set(name, url);
      }
    }
  }

  return links;
}
