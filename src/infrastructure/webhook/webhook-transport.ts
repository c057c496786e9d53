import axios, { AxiosInstance } from 'axios';
import type { Readable } from 'stream';

/**
 * One outgoing webhook POST
 */
export interface WebhookRequest {
  readonly url: string;
  readonly body: string;
  readonly headers: Readonly<Record<string, string>>;
}

/**
 * Open response of a webhook POST. The caller owns it and must close it.
 */
export interface WebhookConnection {
  readBody(): Promise<string>;
  close(): void;
}

/**
 * Transport used by the delivery client.
 * `open` rejects when the connection or the request body write fails.
 */
export interface IWebhookTransport {
  open(request: WebhookRequest): Promise<WebhookConnection>;
}

/**
 * Axios transport options
 */
export interface AxiosWebhookTransportOptions {
  readonly timeout?: number;
}

function toBuffer(chunk: unknown): Buffer {
  if (Buffer.isBuffer(chunk)) {
    return chunk;
  }
  if (typeof chunk === 'string') {
    return Buffer.from(chunk, 'utf8');
  }
  if (chunk instanceof Uint8Array) {
    return Buffer.from(chunk);
  }
  throw new Error(`Unexpected response chunk of type ${typeof chunk}`);
}

/**
 * Response stream of an axios request
 */
class StreamConnection implements WebhookConnection {
  constructor(private readonly stream: Readable) {}

  async readBody(): Promise<string> {
    const chunks: Buffer[] = [];
    for await (const chunk of this.stream) {
      chunks.push(toBuffer(chunk));
    }
    // Decode once so multi-byte characters split across chunks survive
    return Buffer.concat(chunks).toString('utf8');
  }

  close(): void {
    if (!this.stream.destroyed) {
      this.stream.destroy();
    }
  }
}

/**
 * Webhook transport on axios.
 *
 * Every HTTP status resolves: the response body, not the status code,
 * decides whether a notification was delivered.
 */
export class AxiosWebhookTransport implements IWebhookTransport {
  private readonly client: AxiosInstance;

  constructor(options: AxiosWebhookTransportOptions = {}) {
    this.client = axios.create({
      timeout: options.timeout ?? 5000,
      responseType: 'stream',
      validateStatus: () => true,
    });
  }

  async open(request: WebhookRequest): Promise<WebhookConnection> {
    const response = await this.client.post<Readable>(request.url, request.body, {
      headers: { ...request.headers },
    });
    return new StreamConnection(response.data);
  }
}
