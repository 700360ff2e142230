import type { IncomingHttpHeaders, IncomingMessage, RequestListener, ServerResponse } from 'node:http';
import { Readable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import type { FetchFn } from '../backing/object-storage-client.js';
import { describeError, logger as rootLogger, type Logger } from '../logger.js';
import type { AuthMiddleware } from './middleware.js';
import { textResponse } from './responses.js';
import { pathnameOf, type HeaderMap, type HttpResponse, type InboundRequest, type RequestContext } from './types.js';

export const DEFAULT_MAX_BODY_BYTES = 64 * 1024 * 1024;

/** Identity headers only the middleware may set on forwarded requests. */
export const IDENTITY_HEADERS: readonly string[] = [
  'x-remote-user',
  'x-remote-account-id',
  'x-remote-groups',
  'x-remote-owner',
];

// Connection-level headers that do not survive a proxy hop.
const HOP_BY_HOP: ReadonlySet<string> = new Set([
  'connection',
  'keep-alive',
  'proxy-connection',
  'transfer-encoding',
  'upgrade',
  'te',
  'trailer',
  'host',
  'content-length',
]);

// fetch() has already decoded the body.
const DROPPED_RESPONSE_HEADERS: ReadonlySet<string> = new Set([
  ...HOP_BY_HOP,
  'content-encoding',
]);

export interface NodeAdapterOptions {
  readonly middleware: AuthMiddleware;
  /** Upstream origin, e.g. `http://127.0.0.1:8080`. */
  readonly upstream: string;
  /** Limit for bodies sent to the auth surface. Storage bodies are streamed. */
  readonly maxBodyBytes?: number;
  readonly fetch?: FetchFn;
  readonly logger?: Logger;
}

// ── Node adapter ─────────────────────────────────────────────────
//
// Binds the middleware to a node:http server: auth decisions are
// answered locally and everything allowed is proxied upstream. Only
// auth-surface bodies are buffered; storage bodies and upstream
// responses are streamed through.

export function createRequestListener(options: NodeAdapterOptions): RequestListener {
  const upstream = options.upstream.replace(/\/+$/, '');
  const maxBodyBytes = options.maxBodyBytes ?? DEFAULT_MAX_BODY_BYTES;
  const fetchFn = options.fetch ?? fetch;
  const log = (options.logger ?? rootLogger).child({ module: 'node-adapter' });
  const authPrefix = options.middleware.authPrefix;

  const handle = async (req: IncomingMessage, res: ServerResponse): Promise<void> => {
    const path = req.url ?? '/';
    const pathname = pathnameOf(path);
    const isAuthSurface = pathname.startsWith(authPrefix) || pathname === authPrefix.slice(0, -1);

    let body: string | undefined;
    if (isAuthSurface) {
      const buffered = await readBody(req, maxBodyBytes);
      if (buffered === null) {
        writeResponse(res, textResponse(413));
        return;
      }
      body = buffered.toString('utf8');
    }

    const inbound: InboundRequest = {
      method: req.method ?? 'GET',
      path,
      headers: toHeaderMap(req.headers),
      ...(req.socket.remoteAddress !== undefined ? { remoteAddress: req.socket.remoteAddress } : {}),
      ...(body !== undefined ? { body } : {}),
    };

    const result = await options.middleware.handle(inbound);
    if (result.action === 'respond') {
      writeResponse(res, result.response);
      return;
    }

    const method = inbound.method.toUpperCase();
    let upstreamResponse: Response;
    try {
      upstreamResponse = await fetchFn(`${upstream}${inbound.path}`, {
        method,
        headers: forwardHeaders(inbound.headers, result.context),
        ...(hasRequestBody(method, inbound.headers) ? { body: req, duplex: 'half' as const } : {}),
        redirect: 'manual',
      });
    } catch (error) {
      log.error('Upstream request failed', { ...describeError(error), path: inbound.path });
      writeResponse(res, textResponse(502));
      return;
    } finally {
      result.afterForward?.();
    }

    const headers: Record<string, string> = {};
    upstreamResponse.headers.forEach((value, name) => {
      if (!DROPPED_RESPONSE_HEADERS.has(name)) headers[name] = value;
    });
    res.writeHead(upstreamResponse.status, headers);

    const responseBody = upstreamResponse.body;
    if (method === 'HEAD' || responseBody === null) {
      if (responseBody !== null) await responseBody.cancel();
      res.end();
      return;
    }
    await pipeline(Readable.fromWeb(responseBody), res);
  };

  return (req, res) => {
    handle(req, res).catch((error: unknown) => {
      log.error('Request handling failed', describeError(error));
      if (!res.headersSent) {
        writeResponse(res, textResponse(500));
      } else {
        res.destroy();
      }
    });
  };
}

// ── Helpers ──────────────────────────────────────────────────────

export function toHeaderMap(headers: IncomingHttpHeaders): HeaderMap {
  const map: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    if (value === undefined) continue;
    map[name.toLowerCase()] = Array.isArray(value) ? value.join(', ') : value;
  }
  return map;
}

/**
 * Request headers for the upstream hop: client-supplied identity
 * headers are removed and, for authenticated requests, set afresh.
 */
export function forwardHeaders(headers: HeaderMap, context: RequestContext | null): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    if (value === undefined || HOP_BY_HOP.has(name) || IDENTITY_HEADERS.includes(name)) continue;
    result[name] = value;
  }
  if (context !== null) {
    result['x-remote-user'] = `${context.account}:${context.user}`;
    result['x-remote-account-id'] = context.accountId;
    result['x-remote-groups'] = context.groups.join(',');
    result['x-remote-owner'] = context.isOwner ? 'true' : 'false';
  }
  return result;
}

function writeResponse(res: ServerResponse, response: HttpResponse): void {
  res.writeHead(response.status, {
    ...response.headers,
    'content-length': String(Buffer.byteLength(response.body)),
  });
  res.end(response.body);
}

function hasRequestBody(method: string, headers: HeaderMap): boolean {
  if (method === 'GET' || method === 'HEAD') return false;
  if (headers['transfer-encoding'] !== undefined) return true;
  const length = headers['content-length'];
  return length !== undefined && length !== '0';
}

/** Buffers the request body; null once it exceeds `limit` bytes. */
function readBody(req: IncomingMessage, limit: number): Promise<Buffer | null> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let total = 0;
    let overflow = false;

    req.on('data', (chunk: Buffer) => {
      if (overflow) return;
      total += chunk.length;
      if (total > limit) {
        overflow = true;
        chunks.length = 0;
        return;
      }
      chunks.push(chunk);
    });
    req.once('end', () => resolve(overflow ? null : Buffer.concat(chunks)));
    req.once('error', reject);
  });
}
