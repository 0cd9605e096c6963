import * as z from 'zod';

import type { ObjectError, StructuredError, WireErrorRecord } from '../types/index.js';

export type ErrorLike = {
  name: string;
  message: string;
  stack?: string;
  cause?: unknown;
};

const WireErrorRecordSchema = z.object({
  name: z.string(),
  message: z.string(),
  stackLines: z.array(z.string()),
  cause: z.unknown(),
});

const isRecord = (value: unknown): value is Record<string, unknown> => {
  return !!value && typeof value === 'object' && !Array.isArray(value);
};

/** True for `Error` instances and for plain objects carrying string `name`, `message` and `stack`. */
export function isErrorLike(value: unknown): value is ErrorLike {
  if (value instanceof Error) {
    return true;
  }

  return isRecord(value)
    && typeof value.name === 'string'
    && typeof value.message === 'string'
    && typeof value.stack === 'string';
}

// V8 prefixes the trace with "Name: message"; the name it prints is the one the
// prototype carried at construction, which subclasses often rename afterwards.
function toStackLines(stack: string | undefined, message: string): string[] {
  if (!stack) {
    return [];
  }

  let trace = stack;
  const nameToken = /^[\w$.]+/.exec(trace);

  if (nameToken) {
    const header = message ? `${nameToken[0]}: ${message}` : nameToken[0];

    if (trace === header) {
      return [];
    }

    if (trace.startsWith(`${header}\n`)) {
      trace = trace.slice(header.length + 1);
    }
  }

  return trace.split(/\r?\n/);
}

function describe(value: unknown, seen: Set<object>): StructuredError {
  if (!isErrorLike(value)) {
    return { kind: 'value', rawValue: value };
  }

  if (seen.has(value)) {
    return { kind: 'value', rawValue: '[Circular]' };
  }

  seen.add(value);
  const { name, message, stack, cause } = value;
  const described: ObjectError = {
    kind: 'object',
    name: String(name),
    message: String(message),
    stackLines: toStackLines(typeof stack === 'string' ? stack : undefined, String(message)),
    cause: cause === undefined ? null : describe(cause, seen),
  };

  return described;
}

/**
 * Turns anything thrown or used as a rejection reason into a {@link StructuredError}.
 * Never throws.
 */
export function describeError(value: unknown): StructuredError {
  return describe(value, new Set());
}

export function toWireError(error: StructuredError): unknown {
  if (error.kind === 'value') {
    return error.rawValue;
  }

  const record: WireErrorRecord = {
    name: error.name,
    message: error.message,
    stackLines: error.stackLines,
    cause: error.cause ? toWireError(error.cause) : null,
  };

  return record;
}

/** `String(value)`, falling back to the object tag for values that refuse conversion. */
export function safeString(value: unknown): string {
  try {
    return String(value);
  }
  catch {
    return Object.prototype.toString.call(value);
  }
}

function degrade(error: StructuredError): StructuredError {
  if (error.kind === 'value') {
    return { kind: 'value', rawValue: safeString(error.rawValue) };
  }

  return { ...error, cause: error.cause ? degrade(error.cause) : null };
}

function stringify(error: StructuredError): string | undefined {
  try {
    return JSON.stringify(toWireError(error));
  }
  catch {
    return undefined;
  }
}

/** JSON text of the wire form. Raw values JSON cannot hold are sent as their string form. */
export function serializeError(error: StructuredError): string {
  if (error.kind === 'value' && error.rawValue === undefined) {
    return 'null';
  }

  // symbols and functions stringify to nothing, BigInt and cycles throw
  return stringify(error) ?? JSON.stringify(toWireError(degrade(error))) ?? 'null';
}

/**
 * Reads an error payload back. Payloads shaped like an error record become
 * object errors, anything else is kept as a value error.
 */
export function decodeStructuredError(payload: unknown): StructuredError {
  const parsed = WireErrorRecordSchema.safeParse(payload);

  if (!parsed.success) {
    return { kind: 'value', rawValue: payload };
  }

  const { name, message, stackLines, cause } = parsed.data;

  return {
    kind: 'object',
    name,
    message,
    stackLines,
    cause: cause === null || cause === undefined ? null : decodeStructuredError(cause),
  };
}
