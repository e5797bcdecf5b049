import type { OutgoingHttpHeader, OutgoingHttpHeaders, ServerResponse } from 'http';

type WriteCallback = (error?: Error | null) => void;

function isCallback(value: unknown): value is WriteCallback {
  return typeof value === 'function';
}

function isEncoding(value: unknown): value is BufferEncoding {
  return typeof value === 'string' && Buffer.isEncoding(value);
}

function toBuffer(chunk: unknown, encoding: BufferEncoding | undefined): Buffer {
  if (typeof chunk === 'string') return Buffer.from(chunk, encoding ?? 'utf8');
  if (chunk instanceof Uint8Array) return Buffer.from(chunk.buffer, chunk.byteOffset, chunk.byteLength);
  throw new TypeError('Response chunk must be a string, Buffer or Uint8Array');
}

function applyHeaders(res: ServerResponse, headers: OutgoingHttpHeaders | OutgoingHttpHeader[]): void {
  if (Array.isArray(headers)) {
    // Raw form: [name, value, name, value, ...]
    for (let i = 0; i + 1 < headers.length; i += 2) {
      const name: unknown = headers[i];
      const value: OutgoingHttpHeader = headers[i + 1];
      if (typeof name === 'string') res.setHeader(name, value);
    }
    return;
  }

  for (const [name, value] of Object.entries(headers)) {
    if (value !== undefined) res.setHeader(name, value);
  }
}

/**
 * Hold back everything the handler writes until `end`, then call
 * `beforeFlush` with the complete body and send it in one piece.
 *
 * `writeHead` is deferred as well (status and headers are applied with
 * `setHeader`), so `beforeFlush` can still add headers. The bytes that go
 * out are exactly the bytes passed to `beforeFlush`.
 */
export function captureResponseBody(res: ServerResponse, beforeFlush: (body: Buffer) => void): void {
  const originalWrite = res.write;
  const originalEnd = res.end;
  const originalWriteHead = res.writeHead;

  const chunks: Buffer[] = [];
  let ended = false;

  const restore = (): void => {
    res.write = originalWrite;
    res.end = originalEnd;
    res.writeHead = originalWriteHead;
  };

  res.writeHead = (
    statusCode: number,
    reasonOrHeaders?: string | OutgoingHttpHeaders | OutgoingHttpHeader[],
    headers?: OutgoingHttpHeaders | OutgoingHttpHeader[]
  ): ServerResponse => {
    res.statusCode = statusCode;
    if (typeof reasonOrHeaders === 'string') {
      res.statusMessage = reasonOrHeaders;
    } else if (reasonOrHeaders !== undefined) {
      applyHeaders(res, reasonOrHeaders);
    }
    if (headers !== undefined) applyHeaders(res, headers);
    return res;
  };

  res.write = (chunk: unknown, encodingOrCallback?: unknown, callback?: unknown): boolean => {
    if (ended) throw new Error('write after end');

    const encoding = isEncoding(encodingOrCallback) ? encodingOrCallback : undefined;
    const done = isCallback(encodingOrCallback) ? encodingOrCallback : isCallback(callback) ? callback : undefined;

    chunks.push(toBuffer(chunk, encoding));
    if (done) process.nextTick(done, null);
    return true;
  };

  res.end = (chunkOrCallback?: unknown, encodingOrCallback?: unknown, callback?: unknown): ServerResponse => {
    if (ended) return res;
    ended = true;

    let done: WriteCallback | undefined;
    if (isCallback(chunkOrCallback)) {
      done = chunkOrCallback;
    } else {
      if (chunkOrCallback !== undefined && chunkOrCallback !== null) {
        const encoding = isEncoding(encodingOrCallback) ? encodingOrCallback : undefined;
        chunks.push(toBuffer(chunkOrCallback, encoding));
      }
      done = isCallback(encodingOrCallback) ? encodingOrCallback : isCallback(callback) ? callback : undefined;
    }

    const body = Buffer.concat(chunks);
    restore();
    beforeFlush(body);

    if (done) {
      const onFinish = done;
      return res.end(body, () => onFinish());
    }
    return res.end(body);
  };
}
