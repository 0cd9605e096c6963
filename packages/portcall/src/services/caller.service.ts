import type {
  CallOutcome,
  Logger,
  QualifiedName,
  RequestCompletion,
  RequestEvent,
  RequestFactory,
  ResolvedBridgeConfig,
  ValueSchema,
} from '../types/index.js';
import { PROTOCOL_VERSION, encodeAddress, encodeArgument } from '../utils/address.utils.js';
import { safeString } from '../utils/error.utils.js';
import { formatQualifiedName } from '../utils/validation.utils.js';
import { ConfigService } from './config.service.js';
import { decodeOutcome } from './decoder.service.js';

export type CallerOptions = {
  createRequest: RequestFactory;
  protocolVersion?: string;
  logger?: Logger;
  config?: Partial<ResolvedBridgeConfig>;
};

export interface Caller {
  /** Resolves with the outcome of the call; never rejects. */
  call<T>(qualified: QualifiedName, argument: unknown, schema: ValueSchema<T>): Promise<CallOutcome<T>>;
}

function send(createRequest: RequestFactory, url: string, payload: string, logger?: Logger): Promise<RequestCompletion> {
  return new Promise<RequestCompletion>((resolve) => {
    try {
      const request = createRequest();
      const settle = (event: RequestEvent) => {
        resolve(event.type === 'error'
          ? { kind: 'transport-error' }
          : { kind: 'response', status: request.status, body: request.responseText });
      };

      request.addEventListener('load', settle);
      request.addEventListener('error', settle);
      request.open('POST', url, true);
      request.setRequestHeader('Content-Type', 'application/json');
      request.send(payload);
    }
    catch (error) {
      logger?.debug('Host request could not be created or sent', { url, error: safeString(error) });
      resolve({ kind: 'transport-error' });
    }
  });
}

export function createCaller(options: CallerOptions): Caller {
  const { createRequest, protocolVersion = PROTOCOL_VERSION, logger } = options;
  const logCallErrors = options.config?.logCallErrors ?? ConfigService.flag('PORTCALL_LOG_CALL_ERRORS', false);
  const logInteropErrors = options.config?.logInteropErrors ?? ConfigService.flag('PORTCALL_LOG_INTEROP_ERRORS', true);

  const report = <T>(label: string, outcome: CallOutcome<T>) => {
    if (outcome.kind === 'call-failure' && logCallErrors) {
      logger?.error(`portcall function ${label} failed`, { error: outcome.error });
    }
    else if (outcome.kind === 'interop-failure' && logInteropErrors) {
      logger?.error(`portcall interop failure calling ${label}`, { failure: outcome.failure });
    }
  };

  return {
    async call<T>(qualified: QualifiedName, argument: unknown, schema: ValueSchema<T>): Promise<CallOutcome<T>> {
      const label = formatQualifiedName(qualified);
      let payload: string;

      try {
        payload = encodeArgument(argument);
      }
      catch (error) {
        const outcome: CallOutcome<T> = {
          kind: 'interop-failure',
          failure: { kind: 'runtime-error', diagnostic: `Cannot encode argument: ${safeString(error)}` },
        };
        report(label, outcome);
        return outcome;
      }

      const completion = await send(createRequest, encodeAddress(qualified, protocolVersion), payload, logger);
      const outcome = decodeOutcome(completion, schema);
      report(label, outcome);
      return outcome;
    },
  };
}
