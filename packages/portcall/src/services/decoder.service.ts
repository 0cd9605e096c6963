import type { CallOutcome, RequestCompletion, ValueSchema } from '../types/index.js';
import { StatusCode } from '../utils/address.utils.js';
import { decodeStructuredError, safeString } from '../utils/error.utils.js';

type JsonParse = { ok: true; value: unknown } | { ok: false; diagnostic: string };

function parseJson(body: string): JsonParse {
  try {
    return { ok: true, value: JSON.parse(body) };
  }
  catch (error) {
    return { ok: false, diagnostic: safeString(error) };
  }
}

/**
 * Classifies a finished request into a {@link CallOutcome}. Decoding problems
 * become interop failures carrying the raw body and the parser diagnostic;
 * this function never throws.
 */
export function decodeOutcome<T>(completion: RequestCompletion, schema: ValueSchema<T>): CallOutcome<T> {
  if (completion.kind === 'transport-error' || completion.status === 0) {
    return { kind: 'interop-failure', failure: { kind: 'not-installed' } };
  }

  const { status, body } = completion;

  switch (status) {
    case StatusCode.BAD_REQUEST:
      return { kind: 'interop-failure', failure: { kind: 'version-incompatible', details: body } };

    case StatusCode.NOT_FOUND:
      return { kind: 'interop-failure', failure: { kind: 'function-not-found', details: body } };

    case StatusCode.CALL_ERROR: {
      const parsed = parseJson(body);

      if (!parsed.ok) {
        return {
          kind: 'interop-failure',
          failure: { kind: 'runtime-error', diagnostic: `Cannot parse error payload: ${parsed.diagnostic}`, body },
        };
      }

      return { kind: 'call-failure', error: decodeStructuredError(parsed.value) };
    }

    case StatusCode.OK: {
      const parsed = parseJson(body);

      if (!parsed.ok) {
        return { kind: 'interop-failure', failure: { kind: 'cannot-decode-value', body, diagnostic: parsed.diagnostic } };
      }

      const decoded = schema.safeParse(parsed.value);

      if (!decoded.success) {
        return { kind: 'interop-failure', failure: { kind: 'cannot-decode-value', body, diagnostic: decoded.error.message } };
      }

      return { kind: 'success', value: decoded.data };
    }

    default:
      return {
        kind: 'interop-failure',
        failure: { kind: 'runtime-error', diagnostic: `Unexpected response status ${status}`, body },
      };
  }
}
