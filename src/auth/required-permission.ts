// ── Required permission ──────────────────────────────────────────
//
// Every storage request needs one of four levels:
//   reseller-admin – account PUT / DELETE
//   account-admin  – other account verbs, container PUT / POST / DELETE
//   read           – container and object GET / HEAD
//   write          – object PUT / POST / DELETE / COPY
//
// See access-rules.ts for which identities satisfy which level.

export type PermissionLevel = 'read' | 'write' | 'account-admin' | 'reseller-admin';

export interface StorageTarget {
  readonly version: string;
  readonly account: string;
  readonly container: string | null;
  readonly object: string | null;
}

const READ_METHODS: ReadonlySet<string> = new Set(['GET', 'HEAD']);

/**
 * Splits `/<version>/<account>[/<container>[/<object>]]`. Returns null
 * for anything without an account segment or with bad encoding.
 */
export function parseStoragePath(path: string): StorageTarget | null {
  const queryStart = path.indexOf('?');
  const pathname = queryStart === -1 ? path : path.slice(0, queryStart);
  if (!pathname.startsWith('/')) return null;

  const segments = pathname.slice(1).split('/');
  const [version, account, container] = segments;
  if (version === undefined || version.length === 0) return null;
  if (account === undefined || account.length === 0) return null;

  const object = segments.length > 3 ? segments.slice(3).join('/') : null;
  const hasContainer = container !== undefined && container.length > 0;
  if (!hasContainer && object !== null && object.length > 0) return null;

  try {
    return {
      version: decodeURIComponent(version),
      account: decodeURIComponent(account),
      container: hasContainer ? decodeURIComponent(container) : null,
      object: object === null || object.length === 0 ? null : decodeURIComponent(object),
    };
  } catch {
    // Malformed percent-encoding.
    return null;
  }
}

export function requiredPermission(method: string, target: StorageTarget): PermissionLevel {
  const verb = method.toUpperCase();

  if (target.container === null) {
    return verb === 'PUT' || verb === 'DELETE' ? 'reseller-admin' : 'account-admin';
  }
  if (target.object === null) {
    return READ_METHODS.has(verb) ? 'read' : 'account-admin';
  }
  return READ_METHODS.has(verb) ? 'read' : 'write';
}
