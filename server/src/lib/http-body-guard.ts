import type { Context } from 'hono';

export type JsonBodyParseResult =
  | { ok: true; data: unknown }
  | { ok: false; response: Response };

/**
 * Parse a JSON request body, refusing payloads above `maxBytes`.
 * Checks Content-Length up front and the real byte count after reading, so a
 * missing or wrong header does not bypass the limit.
 */
export async function parseJsonBodyWithLimit(c: Context, maxBytes: number): Promise<JsonBodyParseResult> {
  const tooLarge = () => c.json({ error: `Request too large (max ${maxBytes} bytes)` }, 413);

  const contentLength = Number.parseInt(c.req.header('content-length') ?? '', 10);
  if (Number.isFinite(contentLength) && contentLength > maxBytes) {
    return { ok: false, response: tooLarge() };
  }

  const contentType = c.req.header('content-type')?.toLowerCase() ?? '';
  if (contentType && !contentType.includes('application/json')) {
    return {
      ok: false,
      response: c.json({ error: 'Unsupported content type. Use application/json.' }, 415),
    };
  }

  let raw: ArrayBuffer;
  try {
    raw = await c.req.arrayBuffer();
  } catch {
    return { ok: false, response: c.json({ error: 'Failed to read request body' }, 400) };
  }
  if (raw.byteLength > maxBytes) {
    return { ok: false, response: tooLarge() };
  }

  const text = new TextDecoder().decode(raw);
  if (!text.trim()) return { ok: true, data: {} };
  try {
    return { ok: true, data: JSON.parse(text) };
  } catch {
    return { ok: false, response: c.json({ error: 'Request body is not valid JSON' }, 400) };
  }
}
