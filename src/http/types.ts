import type { AccessRuleName } from '../auth/access-rules.js';

// ── Host-facing types ────────────────────────────────────────────

export type HeaderMap = Readonly<Record<string, string | undefined>>;

export interface InboundRequest {
  readonly method: string;
  /** Raw request target: path plus optional query string. */
  readonly path: string;
  /** Lower-case header names. */
  readonly headers: HeaderMap;
  readonly remoteAddress?: string;
  /** Buffered body, where the host has read one. */
  readonly body?: string;
}

export interface HttpResponse {
  readonly status: number;
  readonly headers: Readonly<Record<string, string>>;
  readonly body: string;
}

/** Identity attached to a request the middleware lets through. */
export interface RequestContext {
  readonly account: string;
  readonly user: string;
  readonly accountId: string;
  readonly groups: readonly string[];
  /** Full control of the target account (reseller or account admin). */
  readonly isOwner: boolean;
  /** Granted by reseller-admin rights. */
  readonly isResellerRequest: boolean;
  readonly rule: AccessRuleName;
}

export type MiddlewareResult =
  | {
      readonly action: 'forward';
      readonly context: RequestContext | null;
      /** The host calls this once the upstream has answered (or failed). */
      readonly afterForward?: () => void;
    }
  | { readonly action: 'respond'; readonly response: HttpResponse };

export function header(request: InboundRequest, name: string): string | undefined {
  const value = request.headers[name];
  return value === undefined || value.length === 0 ? undefined : value;
}

/** Path without its query string. */
export function pathnameOf(path: string): string {
  const queryStart = path.indexOf('?');
  return queryStart === -1 ? path : path.slice(0, queryStart);
}
