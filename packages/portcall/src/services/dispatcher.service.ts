import { performance } from 'node:perf_hooks';
import { SpanStatusCode } from '@opentelemetry/api';

import type { BridgeFunction, Logger, ParsedAddress, QualifiedName, ResponseKind } from '../types/index.js';
import { PROTOCOL_VERSION, StatusCode, parseAddress } from '../utils/address.utils.js';
import { describeError, safeString, serializeError } from '../utils/error.utils.js';
import { formatQualifiedName } from '../utils/validation.utils.js';
import { FunctionRegistry } from './registry.service.js';
import { TelemetryService } from './telemetry.service.js';

export type ResolvedTarget = {
  kind: 'resolved';
  fn: BridgeFunction;
  qualified: QualifiedName;
  address: ParsedAddress;
};

export type ResolutionFailure =
  | { kind: 'malformed-address'; url: string }
  | { kind: 'malformed-payload'; qualified: QualifiedName; diagnostic: string }
  | { kind: 'version-incompatible'; expected: string; actual: string }
  | { kind: 'namespace-not-found'; namespaceId: string; known: string[] }
  | { kind: 'namespace-version-mismatch'; namespaceId: string; expected: string; actual: string }
  | { kind: 'function-not-found'; functionName: string; namespaceId?: string; known: string[] };

export type Resolution = ResolvedTarget | ResolutionFailure;

export type DecodedArgument = { kind: 'decoded'; argument: unknown };

export type Completion = {
  status: StatusCode;
  responseType: ResponseKind;
  body: string;
};

const listOrNone = (items: string[]) => (items.length ? items.join(', ') : 'none');

function describeFailure(failure: ResolutionFailure): string {
  switch (failure.kind) {
    case 'malformed-address':
      return `Malformed portcall address: ${failure.url}`;
    case 'malformed-payload':
      return `Malformed argument for ${formatQualifiedName(failure.qualified)}: ${failure.diagnostic}`;
    case 'version-incompatible':
      return `Protocol version conflict: caller uses ${failure.actual}, host uses ${failure.expected}. Both sides must use the same version`;
    case 'namespace-not-found':
      return `Namespace ${failure.namespaceId} is not registered. Known namespaces: ${listOrNone(failure.known)}`;
    case 'namespace-version-mismatch':
      return `Namespace ${failure.namespaceId} version conflict: caller expects ${failure.actual}, host provides ${failure.expected}`;
    case 'function-not-found': {
      const scope = failure.namespaceId ? ` in ${failure.namespaceId}` : '';
      return `Function ${failure.functionName} is not registered${scope}. Known functions: ${listOrNone(failure.known)}`;
    }
  }
}

function statusOf(failure: ResolutionFailure): StatusCode {
  switch (failure.kind) {
    case 'namespace-not-found':
    case 'function-not-found':
      return StatusCode.NOT_FOUND;
    default:
      return StatusCode.BAD_REQUEST;
  }
}

function callAndLift(fn: BridgeFunction, argument: unknown): Promise<unknown> {
  try {
    return Promise.resolve(fn(argument));
  }
  catch (error) {
    return Promise.reject(error);
  }
}

function decodeArgument(body: string | null | undefined): unknown {
  if (body === null || body === undefined || body === '') {
    return null;
  }

  return JSON.parse(body);
}

/**
 * Resolves bridge addresses against a registry and runs the target functions.
 * Nothing here throws: every failure ends up as a {@link Completion}.
 */
export class Dispatcher {
  constructor(
    readonly registry: FunctionRegistry,
    private readonly logger: Logger,
    private readonly protocolVersion = PROTOCOL_VERSION,
  ) {}

  resolve(url: string): Resolution {
    const address = parseAddress(url);
    const resolution = address
      ? this.resolveAddress(address)
      : { kind: 'malformed-address' as const, url };

    if (resolution.kind !== 'resolved') {
      this.report(resolution);
    }

    return resolution;
  }

  private resolveAddress(address: ParsedAddress): Resolution {
    const { protocolVersion, functionName, namespaceId, namespaceVersion } = address;

    if (protocolVersion !== this.protocolVersion) {
      return { kind: 'version-incompatible', expected: this.protocolVersion, actual: protocolVersion };
    }

    let namespace = this.registry.defaultNamespace;

    if (namespaceId !== undefined) {
      const found = this.registry.namespace(namespaceId);

      if (!found) {
        return { kind: 'namespace-not-found', namespaceId, known: this.registry.namespaceIds() };
      }

      if (found.version !== namespaceVersion) {
        return {
          kind: 'namespace-version-mismatch',
          namespaceId,
          expected: found.version,
          actual: namespaceVersion ?? '',
        };
      }

      namespace = found;
    }

    const fn = namespace.find(functionName);

    if (!fn) {
      return { kind: 'function-not-found', functionName, namespaceId, known: namespace.names() };
    }

    const qualified: QualifiedName = namespaceId === undefined
      ? { name: functionName }
      : { name: functionName, namespace: { id: namespaceId, version: namespace.version } };

    return { kind: 'resolved', fn, qualified, address };
  }

  private report(failure: ResolutionFailure): void {
    const message = describeFailure(failure);
    const meta = { failure: failure.kind };

    if (failure.kind === 'namespace-not-found' || failure.kind === 'function-not-found') {
      this.logger.warn(message, meta);
    }
    else {
      this.logger.error(message, meta);
    }
  }

  /** Maps a failed resolution to its status band with a diagnostic body. */
  reject(failure: ResolutionFailure): Completion {
    return {
      status: statusOf(failure),
      responseType: 'text',
      body: describeFailure(failure),
    };
  }

  /** Parses the request body into the call argument; a missing body is `null`. */
  decode(target: ResolvedTarget, body: string | null | undefined): DecodedArgument | ResolutionFailure {
    try {
      return { kind: 'decoded', argument: decodeArgument(body) };
    }
    catch (error) {
      const failure: ResolutionFailure = { kind: 'malformed-payload', qualified: target.qualified, diagnostic: safeString(error) };
      this.report(failure);
      return failure;
    }
  }

  /** Runs the target with a decoded argument. The returned promise never rejects. */
  async invoke(target: ResolvedTarget, argument: unknown): Promise<Completion> {
    const label = formatQualifiedName(target.qualified);
    const started = performance.now();
    const tracer = TelemetryService.getTracer();

    const completion = await tracer.startActiveSpan(`portcall ${label}`, async (span): Promise<Completion> => {
      span.setAttributes({
        'rpc.system': 'portcall',
        'rpc.method': target.qualified.name,
        'portcall.namespace': target.qualified.namespace?.id ?? '',
        'portcall.namespace_version': target.qualified.namespace?.version ?? '',
        'portcall.protocol_version': target.address.protocolVersion,
      });

      try {
        const value = await callAndLift(target.fn, argument);
        span.setStatus({ code: SpanStatusCode.OK });
        return this.succeed(label, value);
      }
      catch (error) {
        const text = safeString(error);
        this.logger.debug('Function call failed', { function: label, error: text });
        span.recordException(error instanceof Error ? error : text);
        span.setStatus({ code: SpanStatusCode.ERROR, message: text });
        return {
          status: StatusCode.CALL_ERROR,
          responseType: 'json',
          body: serializeError(describeError(error)),
        };
      }
      finally {
        span.end();
      }
    });

    TelemetryService.counter('portcall_calls_total', 'Functions invoked through the bridge')
      .add(1, { status: String(completion.status) });
    TelemetryService.histogram('portcall_call_duration_ms', 'Time until the invoked function settled')
      .record(performance.now() - started, { status: String(completion.status) });

    return completion;
  }

  private succeed(label: string, value: unknown): Completion {
    let body: string | undefined;

    try {
      body = value === undefined ? 'null' : JSON.stringify(value);
    }
    catch (error) {
      this.logger.error('Function result cannot be serialized', { function: label, error: safeString(error) });
      return {
        status: StatusCode.CALL_ERROR,
        responseType: 'json',
        body: serializeError(describeError(error)),
      };
    }

    // functions and symbols have no JSON form
    return { status: StatusCode.OK, responseType: 'json', body: body ?? 'null' };
  }
}
