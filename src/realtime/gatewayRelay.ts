import axios, { AxiosInstance } from 'axios';
import { NewMessageFrame } from './connectionRegistry';

export type RelayTarget = { user_id: string } | { role: 'admin' };

export interface RelayEnvelope {
  target: RelayTarget;
  frame: NewMessageFrame;
}

export interface GatewayRelayOptions {
  url?: string;
  secret?: string;
  timeoutMs?: number;
  http?: AxiosInstance;
}

/**
 * Hands `new_message` frames to the external real-time gateway. `enqueue`
 * returns immediately; the POST runs on a later tick with its own timeout,
 * and its outcome is only ever logged.
 */
export class GatewayRelay {
  private readonly pending = new Set<Promise<void>>();
  private readonly http: AxiosInstance;
  private readonly timeoutMs: number;

  constructor(private readonly options: GatewayRelayOptions = {}) {
    this.http = options.http || axios.create();
    this.timeoutMs = options.timeoutMs ?? 2000;
  }

  get enabled(): boolean {
    return Boolean(this.options.url);
  }

  get pendingCount(): number {
    return this.pending.size;
  }

  enqueue(envelope: RelayEnvelope): void {
    if (!this.enabled) return;

    const task: Promise<void> = new Promise<void>(resolve => setImmediate(resolve))
      .then(() => this.post(envelope))
      .finally(() => {
        this.pending.delete(task);
      });
    this.pending.add(task);
  }

  /** Waits for every relay already handed off. Used on shutdown and in tests. */
  async flush(): Promise<void> {
    await Promise.all(Array.from(this.pending));
  }

  private async post(envelope: RelayEnvelope): Promise<void> {
    const url = this.options.url;
    if (!url) return;

    try {
      const response = await this.http.post(url, envelope, {
        timeout: this.timeoutMs,
        headers: this.options.secret ? { Authorization: `Bearer ${this.options.secret}` } : undefined,
        validateStatus: () => true,
      });

      if (response.status < 200 || response.status >= 300) {
        console.warn(`⚠️ Gateway relay for thread ${envelope.frame.thread_id} answered ${response.status}`);
      }
    } catch (error) {
      console.warn(
        `⚠️ Gateway relay for thread ${envelope.frame.thread_id} failed:`,
        error instanceof Error ? error.message : error
      );
    }
  }
}

export const createGatewayRelayFromEnv = (): GatewayRelay =>
  new GatewayRelay({
    url: process.env.CHAT_GATEWAY_URL || undefined,
    secret: process.env.CHAT_GATEWAY_SECRET || undefined,
    timeoutMs: Number(process.env.CHAT_GATEWAY_TIMEOUT_MS) || 2000,
  });
