// ── Audit Entry ──────────────────────────────────────────────────

/** Which part of the middleware answered the request. */
export type AuditSurface = 'auth' | 'storage';

export interface AuditEntry {
  readonly timestamp: number;
  readonly surface: AuditSurface;
  /** `account:user`, `.super_admin`, or null when unauthenticated. */
  readonly userId: string | null;
  readonly method: string;
  readonly path: string;
  readonly status: number;
  readonly remoteAddress: string;
  readonly durationMs: number;
  readonly reason?: string;
}

// ── Audit Config ─────────────────────────────────────────────────

export interface AuditConfig {
  /** Maximum number of entries kept in memory (ring buffer). Default: 10_000. */
  readonly maxEntries?: number;
  /** Optional callback for external persistence. */
  readonly onEntry?: (entry: AuditEntry) => void;
}

// ── Audit Query ──────────────────────────────────────────────────

export interface AuditQuery {
  readonly userId?: string;
  readonly surface?: AuditSurface;
  readonly method?: string;
  /** Entries whose status is at least this value. */
  readonly minStatus?: number;
  readonly from?: number;
  readonly to?: number;
  readonly limit?: number;
}
