import { createConsoleLogger } from './helpers/console-logger.service.js';
import { createFetchRequest, FetchRequest } from './helpers/fetch-request.service.js';
import type { Logger, LogLevel, RequestFactory } from './types/index.js';

export * from './portcall.js';
export * from './bridge.js';
export * from './types/index.js';
export * from './services/config.service.js';
export { FunctionNamespace, FunctionRegistry } from './services/registry.service.js';
export { Dispatcher } from './services/dispatcher.service.js';
export type { Completion, DecodedArgument, Resolution, ResolutionFailure, ResolvedTarget } from './services/dispatcher.service.js';
export { InterceptedRequest, interceptRequests } from './services/interceptor.service.js';
export { createCaller } from './services/caller.service.js';
export type { Caller, CallerOptions } from './services/caller.service.js';
export { decodeOutcome } from './services/decoder.service.js';
export { LoaderService } from './services/loader.service.js';
export { TelemetryService } from './services/telemetry.service.js';
export {
  ADDRESS_PREFIX,
  PROTOCOL_VERSION,
  StatusCode,
  encodeAddress,
  encodeArgument,
  isBridgeAddress,
  parseAddress,
} from './utils/address.utils.js';
export { decodeStructuredError, describeError, isErrorLike, safeString, serializeError, toWireError } from './utils/error.utils.js';
export { RegistrationError, formatQualifiedName, qualify } from './utils/validation.utils.js';
export { FetchRequest };

export const helpers: {
  createConsoleLogger: (level?: LogLevel) => Logger;
  createFetchRequest: RequestFactory<FetchRequest>;
} = {
  createConsoleLogger,
  createFetchRequest,
};
