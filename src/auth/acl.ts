// ── Container ACLs ───────────────────────────────────────────────
//
// An ACL is a comma-separated list. Referrer entries (`.r:<host>`,
// also spelled `.ref:` / `.referer:` / `.referrer:`) grant anonymous
// access by HTTP Referer; everything else is a group name.
//
//   .r:*              any referrer
//   .r:example.com    exact host
//   .r:.example.com   any host ending in .example.com
//   .r:-bad.com       deny (later entries override earlier ones)
//   .rlistings        referrer entries also allow container listings
//   .authenticated    any caller holding a valid token

export const LISTINGS_MARKER = '.rlistings';
export const AUTHENTICATED_MARKER = '.authenticated';

export interface ParsedAcl {
  readonly referrers: readonly string[];
  readonly groups: readonly string[];
}

export const EMPTY_ACL: ParsedAcl = Object.freeze({ referrers: [], groups: [] });

const REFERRER_PREFIXES = ['.r:', '.ref:', '.referer:', '.referrer:'];

export function parseAcl(value: string | null | undefined): ParsedAcl {
  if (value === null || value === undefined) return EMPTY_ACL;

  const referrers: string[] = [];
  const groups: string[] = [];
  for (const raw of value.split(',')) {
    const entry = raw.trim();
    if (entry.length === 0) continue;

    const prefix = REFERRER_PREFIXES.find((p) => entry.startsWith(p));
    if (prefix !== undefined) {
      const host = entry.slice(prefix.length).trim();
      if (host.length > 0 && host !== '-') referrers.push(host);
      continue;
    }
    groups.push(entry);
  }
  return { referrers, groups };
}

/** Whether the Referer header satisfies the referrer entries. Last match wins. */
export function referrerAllowed(referer: string | undefined, referrers: readonly string[]): boolean {
  if (referrers.length === 0) return false;

  const host = refererHost(referer);
  let allowed = false;
  for (const entry of referrers) {
    if (entry.startsWith('-')) {
      if (hostMatches(entry.slice(1), host)) allowed = false;
    } else if (entry === '*' || hostMatches(entry, host)) {
      allowed = true;
    }
  }
  return allowed;
}

function hostMatches(pattern: string, host: string): boolean {
  if (pattern === host) return true;
  return pattern.startsWith('.') && host.endsWith(pattern);
}

function refererHost(referer: string | undefined): string {
  if (referer === undefined || referer.length === 0) return 'unknown';
  try {
    const hostname = new URL(referer).hostname;
    return hostname.length > 0 ? hostname : 'unknown';
  } catch {
    // Not an absolute URL.
    return 'unknown';
  }
}
