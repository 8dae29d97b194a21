import { WebSocket } from 'ws';
import type { RawData } from 'ws';
import { StreamingError } from '../errors.js';
import type { Transport, TransportConnectOptions } from '../types.js';

function toBuffer(data: RawData): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (Array.isArray(data)) return Buffer.concat(data);
  return Buffer.from(data);
}

type Waiter = {
  resolve: (value: Buffer | null) => void;
  reject: (err: Error) => void;
};

/**
 * `Transport` over a `ws` client socket. Inbound messages are queued in arrival order
 * until the consumer asks for them; the socket never pushes into the engine directly.
 */
export class WebSocketTransport implements Transport {
  private readonly ws: WebSocket;
  private inbox: Buffer[] = [];
  private waiters: Waiter[] = [];
  private closed = false;
  private failure: StreamingError | null = null;
  private pingTimer: NodeJS.Timeout | null = null;
  closeCode: number | null = null;
  closeReason = '';

  private constructor(ws: WebSocket, pingIntervalMs?: number) {
    this.ws = ws;

    ws.on('message', (data) => {
      const buffer = toBuffer(data);
      const waiter = this.waiters.shift();
      if (waiter) {
        waiter.resolve(buffer);
      } else {
        this.inbox.push(buffer);
      }
    });

    ws.on('error', (err) => {
      this.failure ??= new StreamingError('transport_closed', `websocket error: ${err.message}`, { cause: err });
    });

    ws.on('close', (code, reason) => {
      this.closed = true;
      this.closeCode = code;
      this.closeReason = reason.toString();
      this.stopPing();
      const pending = this.waiters.splice(0, this.waiters.length);
      pending.forEach((waiter) => (this.failure ? waiter.reject(this.failure) : waiter.resolve(null)));
    });

    if (pingIntervalMs && pingIntervalMs > 0) {
      this.pingTimer = setInterval(() => {
        if (ws.readyState === WebSocket.OPEN) ws.ping();
      }, pingIntervalMs);
      this.pingTimer.unref?.();
    }
  }

  static connect(opts: TransportConnectOptions): Promise<WebSocketTransport> {
    const ws = new WebSocket(opts.url, { headers: opts.headers, perMessageDeflate: false });

    return new Promise<WebSocketTransport>((resolve, reject) => {
      let settled = false;
      const settle = (err: StreamingError | null) => {
        if (settled) return;
        settled = true;
        opts.signal?.removeEventListener('abort', onAbort);
        if (err) {
          // Listeners stay attached: a failed handshake still emits error/close afterwards.
          reject(err);
          return;
        }
        ws.off('error', onError);
        ws.off('close', onClose);
        resolve(new WebSocketTransport(ws, opts.pingIntervalMs));
      };
      const onError = (err: Error) => {
        settle(new StreamingError('transport_closed', `websocket connect failed: ${err.message}`, { cause: err }));
      };
      const onClose = (code: number) => {
        settle(new StreamingError('transport_closed', `websocket closed before open (code ${code})`));
      };
      const onAbort = () => {
        ws.terminate();
        settle(new StreamingError('transport_closed', 'websocket connect aborted'));
      };

      ws.once('open', () => settle(null));
      ws.once('unexpected-response', (req, res) => {
        req.destroy();
        settle(new StreamingError('rejected', `handshake rejected with HTTP ${res.statusCode ?? 'unknown'}`));
      });
      ws.on('error', onError);
      ws.on('close', onClose);

      if (opts.signal?.aborted) {
        onAbort();
      } else {
        opts.signal?.addEventListener('abort', onAbort, { once: true });
      }
    });
  }

  send(data: Buffer): Promise<void> {
    if (this.closed || this.ws.readyState !== WebSocket.OPEN) {
      return Promise.reject(this.failure ?? new StreamingError('transport_closed', 'websocket is not open'));
    }
    return new Promise<void>((resolve, reject) => {
      this.ws.send(data, { binary: true }, (err) => {
        if (err) {
          reject(new StreamingError('transport_closed', `websocket send failed: ${err.message}`, { cause: err }));
        } else {
          resolve();
        }
      });
    });
  }

  receive(): Promise<Buffer | null> {
    const next = this.inbox.shift();
    if (next) return Promise.resolve(next);
    if (this.closed) {
      return this.failure ? Promise.reject(this.failure) : Promise.resolve(null);
    }
    return new Promise<Buffer | null>((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
  }

  close(code = 1000, reason = ''): void {
    this.stopPing();
    if (this.ws.readyState === WebSocket.OPEN || this.ws.readyState === WebSocket.CONNECTING) {
      this.ws.close(code, reason);
    }
  }

  private stopPing(): void {
    if (this.pingTimer) {
      clearInterval(this.pingTimer);
      this.pingTimer = null;
    }
  }
}

export const connectWebSocket = (opts: TransportConnectOptions): Promise<Transport> => WebSocketTransport.connect(opts);
