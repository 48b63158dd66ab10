import {
  EncodingError,
  TerminalDeliveryError,
  type DeliveryRequest,
  type HttpClient,
  type HttpHeaders,
  type HttpMethod,
  type Logger,
} from '@batchsink/resilient-http-core';
import { encodeText } from './charset';
import type { MessageBuffer } from './messageBuffer';
import type { PlaceholderResolver } from './placeholders';
import type { StructuredRecord } from './record';

export interface HttpRecordWriterOptions {
  client: HttpClient;
  buffer: MessageBuffer;
  resolver: PlaceholderResolver;
  method: HttpMethod;
  url: string;
  batchSize: number;
  charset: string;
  headers?: HttpHeaders;
  logger?: Logger;
}

export class WriterClosedError extends Error {
  constructor() {
    super('HttpRecordWriter is closed');
    this.name = 'WriterClosedError';
  }
}

/**
 * Buffers records and delivers them in batches of `batchSize`.
 *
 * `write`, `flush` and `close` are queued behind one another, so a batch is
 * never sent while the previous one is still in flight, even when the caller
 * does not await each write. A flush that fails still empties the buffer; the
 * error is returned to the call that triggered it.
 */
export class HttpRecordWriter {
  private tail: Promise<void> = Promise.resolve();
  private closed = false;
  private readonly logger?: Logger;

  constructor(private readonly options: HttpRecordWriterOptions) {
    this.logger = options.logger;
  }

  get pendingRecords(): number {
    return this.options.buffer.size();
  }

  get isClosed(): boolean {
    return this.closed;
  }

  write(record: StructuredRecord): Promise<void> {
    if (this.closed) {
      return Promise.reject(new WriterClosedError());
    }
    return this.enqueue(async () => {
      this.options.buffer.add(record);
      if (this.options.buffer.size() >= this.options.batchSize) {
        await this.flushBuffer();
      }
    });
  }

  /** Sends whatever is buffered now, even a partial batch. */
  flush(): Promise<void> {
    return this.enqueue(() => this.flushBuffer());
  }

  /** Flushes the remaining partial batch; later writes are rejected. */
  close(): Promise<void> {
    if (this.closed) {
      return this.tail;
    }
    this.closed = true;
    return this.enqueue(() => this.flushBuffer());
  }

  private enqueue(task: () => Promise<void>): Promise<void> {
    const run = this.tail.then(task);
    // The failure belongs to the caller holding `run`; later tasks still run.
    this.tail = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  private async flushBuffer(): Promise<void> {
    const { buffer } = this.options;
    if (buffer.isEmpty()) return;

    const records = buffer.size();
    let request: DeliveryRequest | undefined;
    try {
      request = this.buildRequest();
      const result = await this.options.client.deliver(request);
      this.logger?.info('http.sink.flush', {
        method: request.method,
        url: request.url,
        records,
        status: result.status,
        attempts: result.attempts,
        acceptedAfterExhaustion: result.outcome.acceptedAfterExhaustion ?? false,
      });
    } catch (error) {
      this.logger?.error('http.sink.flush.failed', {
        method: this.options.method,
        url: request?.url ?? this.options.url,
        records,
        error: error instanceof Error ? error.message : String(error),
      });
      if (error instanceof EncodingError) {
        throw new TerminalDeliveryError(`Could not build the request for ${records} record(s): ${error.message}`, {
          url: this.options.url,
          attempts: 0,
          reason: 'encoding',
          cause: error,
        });
      }
      throw error;
    } finally {
      buffer.clear();
    }
  }

  private buildRequest(): DeliveryRequest {
    const { buffer, resolver, method } = this.options;
    const last = buffer.lastRecord();
    const url = last && resolver.hasPlaceholders ? resolver.resolve(last) : this.options.url;

    let body: Uint8Array | undefined;
    if (method === 'POST' || method === 'PUT') {
      const message = buffer.getMessage();
      body = message === null ? undefined : encodeText(message, this.options.charset);
    }

    return {
      method,
      url,
      headers: { ...(this.options.headers ?? {}) },
      body,
      operation: 'sink.flush',
    };
  }
}
