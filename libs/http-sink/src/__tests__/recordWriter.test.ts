import {
  TerminalDeliveryError,
  type HttpTransport,
  type Logger,
  type RawHttpResponse,
  type TransportRequest,
} from '@batchsink/resilient-http-core';
import { beforeEach, describe, expect, it, vi } from 'vitest';
import { parseSinkConfig, type SinkConfigInput } from '../config';
import { createHttpSinkWriter, createHttpSinkWriterFromEnv } from '../factories';
import { createRecord, type RecordSchema, type RecordValue } from '../record';
import { WriterClosedError } from '../recordWriter';

const decoder = new TextDecoder();

const reply = (status: number, body = ''): RawHttpResponse => ({
  status,
  headers: {},
  body: new TextEncoder().encode(body),
});

function scriptedTransport(...statuses: number[]) {
  const calls: TransportRequest[] = [];
  const transport: HttpTransport = async (req) => {
    calls.push(req);
    return reply(statuses[Math.min(calls.length - 1, statuses.length - 1)]);
  };
  return { transport, calls };
}

const bodyOf = (req: TransportRequest) => (req.body ? decoder.decode(req.body) : undefined);

describe('HttpRecordWriter', () => {
  let logger: Logger;

  beforeEach(() => {
    logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
  });

  const writerFor = (input: SinkConfigInput, schema: RecordSchema, transport: HttpTransport) =>
    createHttpSinkWriter(parseSinkConfig(input), schema, { transport, logger, sleep: async () => {} });

  const recordOf = (schema: RecordSchema, values: Record<string, RecordValue>) => createRecord(schema, values);

  const schemaA: RecordSchema = { fields: [{ name: 'a', type: 'int' }] };

  it('sends a JSON batch once batchSize records are buffered and retries a 503', async () => {
    const { transport, calls } = scriptedTransport(503, 200);
    const writer = writerFor({ url: 'https://ingest.example.com/events', batchSize: 2 }, schemaA, transport);

    await writer.write(recordOf(schemaA, { a: 1 }));
    expect(calls).toHaveLength(0);

    await writer.write(recordOf(schemaA, { a: 2 }));

    expect(calls).toHaveLength(2);
    expect(calls[1].method).toBe('POST');
    expect(calls[1].url).toBe('https://ingest.example.com/events');
    expect(bodyOf(calls[1])).toBe('[{"a":1},{"a":2}]');
    expect(calls[1].headers['Content-Type']).toBe('application/json');
    expect(writer.pendingRecords).toBe(0);
    expect(logger.info).toHaveBeenCalledWith(
      'http.sink.flush',
      expect.objectContaining({ records: 2, status: 200, attempts: 2 }),
    );
  });

  it('flushes a partial batch only on close and rejects later writes', async () => {
    const { transport, calls } = scriptedTransport(200);
    const writer = writerFor({ url: 'https://ingest.example.com/events', batchSize: 3 }, schemaA, transport);

    await writer.write(recordOf(schemaA, { a: 1 }));
    await writer.write(recordOf(schemaA, { a: 2 }));
    expect(calls).toHaveLength(0);

    await writer.close();

    expect(calls).toHaveLength(1);
    expect(bodyOf(calls[0])).toBe('[{"a":1},{"a":2}]');
    await expect(writer.write(recordOf(schemaA, { a: 3 }))).rejects.toBeInstanceOf(WriterClosedError);
  });

  it('resolves DELETE URLs from the record and sends no body', async () => {
    const schema: RecordSchema = { fields: [{ name: 'id' }] };
    const { transport, calls } = scriptedTransport(204);
    const writer = writerFor({ url: 'https://x.example.com/#id', method: 'DELETE' }, schema, transport);

    await writer.write(recordOf(schema, { id: '7' }));

    expect(calls).toHaveLength(1);
    expect(calls[0].method).toBe('DELETE');
    expect(calls[0].url).toBe('https://x.example.com/7');
    expect(calls[0].body).toBeUndefined();
    expect(calls[0].headers).toEqual({});
  });

  it('builds the PUT URL from the last record of the batch', async () => {
    const schema: RecordSchema = { fields: [{ name: 'id' }] };
    const { transport, calls } = scriptedTransport(200);
    const writer = writerFor(
      { url: 'https://x.example.com/items/#id', method: 'PUT', batchSize: 2 },
      schema,
      transport,
    );

    await writer.write(recordOf(schema, { id: '1' }));
    await writer.write(recordOf(schema, { id: '2' }));

    expect(calls[0].url).toBe('https://x.example.com/items/2');
    expect(bodyOf(calls[0])).toBe('[{"id":"1"},{"id":"2"}]');
  });

  it('sends characters ISO-8859-1 cannot represent as question marks', async () => {
    const schema: RecordSchema = { fields: [{ name: 'id' }] };
    const { transport, calls } = scriptedTransport(200);
    const writer = writerFor(
      { url: 'https://x.example.com/items/#id', method: 'PUT', charset: 'ISO-8859-1' },
      schema,
      transport,
    );

    await writer.write(recordOf(schema, { id: 'café€' }));

    expect(calls[0].url).toBe('https://x.example.com/items/caf%E9%3F');
    expect(Array.from(calls[0].body ?? [])).toEqual(Array.from(Buffer.from('[{"id":"caf\u00e9?"}]', 'latin1')));
  });

  it('fails a rejected batch without retrying, clears it, and keeps accepting writes', async () => {
    const { transport, calls } = scriptedTransport(404, 200);
    const writer = writerFor(
      { url: 'https://ingest.example.com/events', httpErrorsHandling: '5\\d\\d:retry,4\\d\\d:fail' },
      schemaA,
      transport,
    );

    const error = await writer.write(recordOf(schemaA, { a: 1 })).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(TerminalDeliveryError);
    expect(error).toMatchObject({ reason: 'fail-action', statusCode: 404, attempts: 1 });
    expect(calls).toHaveLength(1);
    expect(writer.pendingRecords).toBe(0);

    await writer.write(recordOf(schemaA, { a: 2 }));
    expect(bodyOf(calls[1])).toBe('[{"a":2}]');
  });

  it('surfaces placeholder failures as encoding errors without sending', async () => {
    const schema: RecordSchema = { fields: [{ name: 'id' }] };
    const { transport, calls } = scriptedTransport(200);
    const writer = writerFor(
      { url: 'https://x.example.com/#id', method: 'PUT', missingPlaceholder: 'fail' },
      schema,
      transport,
    );

    await expect(writer.write(recordOf(schema, { id: null }))).rejects.toMatchObject({
      name: 'TerminalDeliveryError',
      reason: 'encoding',
      attempts: 0,
    });
    expect(calls).toHaveLength(0);
    expect(writer.pendingRecords).toBe(0);
  });

  it('sends configured headers and keeps a caller-set content type', async () => {
    const { transport, calls } = scriptedTransport(200);
    const writer = writerFor(
      {
        url: 'https://ingest.example.com/events',
        requestHeaders: 'X-Api-Key: test-key\ncontent-type: application/vnd.events+json',
      },
      schemaA,
      transport,
    );

    await writer.write(recordOf(schemaA, { a: 1 }));

    expect(calls[0].headers).toEqual({
      'X-Api-Key': 'test-key',
      'content-type': 'application/vnd.events+json',
    });
  });

  it('adds a bearer token from the OAuth2 token endpoint', async () => {
    const calls: TransportRequest[] = [];
    const transport: HttpTransport = async (req) => {
      calls.push(req);
      if (req.url === 'https://auth.example.com/token') {
        return reply(200, '{"access_token":"test-access-token","expires_in":3600}');
      }
      return reply(200);
    };
    const writer = writerFor(
      {
        url: 'https://ingest.example.com/events',
        oauth2: {
          enabled: true,
          tokenUrl: 'https://auth.example.com/token',
          clientId: 'sink-client',
          clientSecret: 'test-secret',
          grantType: 'client_credentials',
        },
      },
      schemaA,
      transport,
    );

    await writer.write(recordOf(schemaA, { a: 1 }));
    await writer.write(recordOf(schemaA, { a: 2 }));

    expect(calls.map((req) => req.url)).toEqual([
      'https://auth.example.com/token',
      'https://ingest.example.com/events',
      'https://ingest.example.com/events',
    ]);
    expect(calls[1].headers.Authorization).toBe('Bearer test-access-token');
    expect(calls[2].headers.Authorization).toBe('Bearer test-access-token');
  });

  it('never has two batches in flight when writes are not awaited', async () => {
    let inFlight = 0;
    let maxInFlight = 0;
    const sent: string[] = [];
    const transport: HttpTransport = async (req) => {
      inFlight += 1;
      maxInFlight = Math.max(maxInFlight, inFlight);
      await new Promise((resolve) => setTimeout(resolve, 5));
      sent.push(bodyOf(req) ?? '');
      inFlight -= 1;
      return reply(200);
    };
    const writer = writerFor({ url: 'https://ingest.example.com/events' }, schemaA, transport);

    await Promise.all([
      writer.write(recordOf(schemaA, { a: 1 })),
      writer.write(recordOf(schemaA, { a: 2 })),
      writer.write(recordOf(schemaA, { a: 3 })),
    ]);

    expect(maxInFlight).toBe(1);
    expect(sent).toEqual(['[{"a":1}]', '[{"a":2}]', '[{"a":3}]']);
  });

  it('builds a writer from HTTP_SINK_* variables', async () => {
    const { transport, calls } = scriptedTransport(200);
    const writer = createHttpSinkWriterFromEnv(schemaA, {
      env: {
        HTTP_SINK_URL: 'https://ingest.example.com/events',
        HTTP_SINK_MESSAGE_FORMAT: 'csv',
        HTTP_SINK_BATCH_SIZE: '2',
      },
      transport,
      logger,
    });

    await writer.write(recordOf(schemaA, { a: 1 }));
    await writer.write(recordOf(schemaA, { a: 2 }));

    expect(bodyOf(calls[0])).toBe('1\n2');
    expect(calls[0].headers['Content-Type']).toBe('text/csv');
  });
});
