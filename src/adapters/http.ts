import type { z } from 'zod';
import { ModelError, errorMessage } from '../errors.js';

/**
 * Read a provider response body and check it against the expected shape
 */
export async function readJson<T>(
  response: Response,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  provider: string
): Promise<T> {
  let body: unknown;
  try {
    body = await response.json();
  } catch (error) {
    throw new ModelError(provider, `invalid JSON body (${errorMessage(error)})`);
  }

  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    throw new ModelError(provider, `unexpected response shape: ${parsed.error.issues[0]?.message ?? 'unknown'}`);
  }
  return parsed.data;
}

/**
 * Turn a non-2xx response into a ModelError carrying the provider's message
 */
export async function failedResponse(response: Response, provider: string): Promise<ModelError> {
  const text = await response.text().catch(() => '');
  let detail = text || response.statusText;

  try {
    const body: unknown = JSON.parse(text);
    if (typeof body === 'object' && body !== null && 'error' in body) {
      const inner = body.error;
      if (typeof inner === 'string') detail = inner;
      else if (typeof inner === 'object' && inner !== null && 'message' in inner && typeof inner.message === 'string') {
        detail = inner.message;
      }
    }
  } catch {
    // plain-text error body; keep it as is
  }

  return new ModelError(provider, `${response.status} ${detail}`);
}
