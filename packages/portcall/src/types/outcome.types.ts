import type { ZodType, ZodTypeDef } from 'zod';

import type { StructuredError } from './error.types.js';

/** Decoder for successful results; any zod schema producing `T`, transforms included. */
export type ValueSchema<T> = ZodType<T, ZodTypeDef, unknown>;

export type InteropFailure =
  | { kind: 'not-installed' }
  | { kind: 'function-not-found'; details: string }
  | { kind: 'version-incompatible'; details: string }
  | { kind: 'cannot-decode-value'; body: string; diagnostic: string }
  | { kind: 'runtime-error'; diagnostic: string; body?: string };

export type InteropFailureKind = InteropFailure['kind'];

export type CallOutcome<T> =
  | { kind: 'success'; value: T }
  | { kind: 'call-failure'; error: StructuredError }
  | { kind: 'interop-failure'; failure: InteropFailure };

/** What the caller observed once a request finished. */
export type RequestCompletion =
  | { kind: 'transport-error' }
  | { kind: 'response'; status: number; body: string };
