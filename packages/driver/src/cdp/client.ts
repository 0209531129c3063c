/**
 * Chrome DevTools Protocol client.
 *
 * `ProtocolClient` is all the driver needs from a transport: one call per
 * command, addressed to a session. `CdpConnection` implements it over the
 * browser's remote-debugging WebSocket.
 */

import WebSocket from 'ws';
import { z } from 'zod';
import type { DriverOptions } from '../config.js';
import { resolveTimeout } from '../config.js';
import { ProtocolError, WaitCanceledError } from '../errors.js';

export interface ProtocolClient {
  /**
   * Send a command and resolve with its result. Rejects with
   * {@link ProtocolError} when the browser answers with an error, and with
   * {@link WaitCanceledError} when `signal` aborts first.
   */
  call<T = unknown>(
    method: string,
    params?: object,
    sessionId?: string,
    signal?: AbortSignal
  ): Promise<T>;
}

export type EventListener = (params: Record<string, unknown>, sessionId?: string) => void;

/**
 * `timeout` falls back to HANDRAIL_CDP_TIMEOUT, then 30000 ms.
 */
export type ConnectionOptions = Pick<DriverOptions, 'timeout'>;

const CdpMessage = z.object({
  id: z.number().optional(),
  method: z.string().optional(),
  params: z.record(z.unknown()).optional(),
  result: z.unknown().optional(),
  error: z
    .object({
      code: z.number(),
      message: z.string(),
      data: z.string().optional(),
    })
    .optional(),
  sessionId: z.string().optional(),
});

type CdpMessage = z.infer<typeof CdpMessage>;

const VersionMetadata = z.object({
  webSocketDebuggerUrl: z.string().min(1),
});

interface PendingRequest {
  method: string;
  resolve: (value: unknown) => void;
  reject: (err: Error) => void;
  cleanup: () => void;
}

/**
 * Resolve a CDP WebSocket URL from common user inputs.
 *
 * Chrome's remote debugging port is an HTTP server. A bare `ws://host:port`
 * is not a valid CDP websocket endpoint. When given a bare host:port (either
 * as `ws://host:port` or `http://host:port`), resolve it via `/json/version`.
 */
export async function resolveCdpWebSocketUrl(input: string): Promise<string> {
  let url: URL;
  try {
    url = new URL(input);
  } catch {
    throw new Error(
      `Invalid CDP URL "${input}". Expected a full CDP websocket URL like ` +
        `"ws://127.0.0.1:9222/devtools/browser/<id>" or a remote-debugging ` +
        `origin like "http://127.0.0.1:9222".`
    );
  }

  const isWs = url.protocol === 'ws:' || url.protocol === 'wss:';
  const isHttp = url.protocol === 'http:' || url.protocol === 'https:';

  // Already a full CDP websocket URL.
  if (isWs && url.pathname !== '' && url.pathname !== '/') {
    return url.toString();
  }
  if (!isWs && !isHttp) {
    return url.toString();
  }

  const versionUrl = new URL(url.toString());
  if (versionUrl.protocol === 'ws:') versionUrl.protocol = 'http:';
  if (versionUrl.protocol === 'wss:') versionUrl.protocol = 'https:';
  versionUrl.pathname = '/json/version';
  versionUrl.search = '';
  versionUrl.hash = '';

  const res = await fetch(versionUrl.toString());
  if (!res.ok) {
    throw new Error(`Failed to fetch CDP version metadata from ${versionUrl} (${res.status})`);
  }

  const meta = VersionMetadata.safeParse(await res.json());
  if (!meta.success) {
    throw new Error(`CDP version metadata from ${versionUrl} did not include "webSocketDebuggerUrl"`);
  }

  return meta.data.webSocketDebuggerUrl;
}

export class CdpConnection implements ProtocolClient {
  private pending = new Map<number, PendingRequest>();
  private listeners = new Map<string, Set<EventListener>>();
  private requestId = 0;
  private readonly timeout: number;

  private constructor(
    private ws: WebSocket | null,
    options: ConnectionOptions
  ) {
    this.timeout = resolveTimeout(options.timeout);
  }

  /**
   * Open a connection to a browser. `url` is a full CDP websocket URL or a
   * remote-debugging origin.
   */
  static async connect(url: string, options: ConnectionOptions = {}): Promise<CdpConnection> {
    const resolvedUrl = await resolveCdpWebSocketUrl(url);

    const ws = await new Promise<WebSocket>((resolve, reject) => {
      const socket = new WebSocket(resolvedUrl);
      socket.once('open', () => {
        socket.off('error', reject);
        resolve(socket);
      });
      socket.once('error', reject);
    });

    const connection = new CdpConnection(ws, options);

    ws.on('message', (data) => connection.onMessage(data.toString()));
    ws.on('close', () => connection.onClose());
    ws.on('error', (err) => console.error(`CDP socket error: ${err.message}`));

    return connection;
  }

  isConnected(): boolean {
    return this.ws !== null && this.ws.readyState === WebSocket.OPEN;
  }

  call<T = unknown>(
    method: string,
    params?: object,
    sessionId?: string,
    signal?: AbortSignal
  ): Promise<T> {
    const ws = this.ws;
    if (!ws || ws.readyState !== WebSocket.OPEN) {
      return Promise.reject(new ProtocolError('Not connected', method));
    }
    if (signal?.aborted) {
      return Promise.reject(new WaitCanceledError(signal.reason));
    }

    const id = ++this.requestId;
    const message: Record<string, unknown> = { id, method };
    if (params) message.params = params;
    if (sessionId) message.sessionId = sessionId;

    return new Promise<T>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.settle(id)?.reject(new ProtocolError('Request timeout', method));
      }, this.timeout);

      const onAbort = (): void => {
        this.settle(id)?.reject(new WaitCanceledError(signal?.reason));
      };
      signal?.addEventListener('abort', onAbort, { once: true });

      this.pending.set(id, {
        method,
        // Results are typed by the caller against devtools-protocol's response types.
        resolve: (value) => resolve(value as T),
        reject,
        cleanup: () => {
          clearTimeout(timer);
          signal?.removeEventListener('abort', onAbort);
        },
      });

      ws.send(JSON.stringify(message));
    });
  }

  /**
   * Subscribe to a protocol event. Returns an unsubscribe function.
   */
  on(method: string, listener: EventListener): () => void {
    const set = this.listeners.get(method) ?? new Set<EventListener>();
    this.listeners.set(method, set);
    set.add(listener);
    return () => {
      set.delete(listener);
    };
  }

  close(): void {
    if (this.ws) {
      this.ws.close();
    }
    this.onClose();
  }

  private settle(id: number): PendingRequest | undefined {
    const pending = this.pending.get(id);
    if (!pending) return undefined;
    this.pending.delete(id);
    pending.cleanup();
    return pending;
  }

  private onMessage(raw: string): void {
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      console.error(`CDP message is not JSON: ${err instanceof Error ? err.message : String(err)}`);
      return;
    }

    const parsed = CdpMessage.safeParse(json);
    if (!parsed.success) {
      console.error(`Unexpected CDP message: ${parsed.error.message}`);
      return;
    }
    this.handleMessage(parsed.data);
  }

  private handleMessage(message: CdpMessage): void {
    // Response to a request
    if (message.id !== undefined) {
      const pending = this.settle(message.id);
      if (!pending) return;

      if (message.error) {
        pending.reject(
          new ProtocolError(message.error.message, pending.method, message.error.code, message.error.data)
        );
      } else {
        pending.resolve(message.result ?? {});
      }
      return;
    }

    // Event
    if (message.method) {
      const set = this.listeners.get(message.method);
      if (!set) return;
      for (const listener of set) {
        listener(message.params ?? {}, message.sessionId);
      }
    }
  }

  private onClose(): void {
    this.ws = null;
    for (const id of [...this.pending.keys()]) {
      const pending = this.settle(id);
      pending?.reject(new ProtocolError('Disconnected', pending.method));
    }
  }
}
