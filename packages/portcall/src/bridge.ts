import type {
  BridgeConfig,
  BridgeFunction,
  LoadConfig,
  Logger,
  RequestFactory,
  RequestPrimitive,
  ResolvedBridgeConfig,
} from './types/index.js';
import { ConfigService } from './services/config.service.js';
import { Dispatcher } from './services/dispatcher.service.js';
import { FunctionNamespace, FunctionRegistry } from './services/registry.service.js';
import { InterceptedRequest, interceptRequests } from './services/interceptor.service.js';
import { LoaderService } from './services/loader.service.js';
import { createCaller, type Caller, type CallerOptions } from './services/caller.service.js';
import { createConsoleLogger } from './helpers/console-logger.service.js';

export type BridgeOptions = {
  config?: BridgeConfig;
  logger?: Logger;
};

/** Host and caller halves sharing one registry. */
export interface Bridge {
  readonly registry: FunctionRegistry;
  readonly dispatcher: Dispatcher;
  readonly config: ResolvedBridgeConfig;
  readonly logger: Logger;
  register(name: string, fn: BridgeFunction): void;
  createNamespace(id: string, version: string): FunctionNamespace;
  /** Returns a factory whose requests are answered by this bridge. Installing the same factory twice returns the same wrapper. */
  install<T extends RequestPrimitive>(factory: RequestFactory<T>): RequestFactory<InterceptedRequest>;
  load(param: LoadConfig): Promise<number>;
  createCaller(createRequest: RequestFactory, options?: Omit<CallerOptions, 'createRequest'>): Caller;
}

export function createBridge(options: BridgeOptions = {}): Bridge {
  const config = ConfigService.resolveConfig(options.config);
  const logger = (options.logger ?? createConsoleLogger()).child({ component: 'portcall' });
  const registry = new FunctionRegistry(logger);
  const dispatcher = new Dispatcher(registry, logger);
  const installed = new WeakMap<RequestFactory, RequestFactory<InterceptedRequest>>();

  return {
    registry,
    dispatcher,
    config,
    logger,
    register(name, fn) {
      registry.register(name, fn);
    },
    createNamespace(id, version) {
      return registry.createNamespace(id, version);
    },
    install(factory) {
      const existing = installed.get(factory);

      if (existing) {
        return existing;
      }

      const wrapped = interceptRequests(factory, dispatcher, logger);
      installed.set(factory, wrapped);
      return wrapped;
    },
    load(param) {
      return LoaderService.loadFunctions(registry, param, logger);
    },
    createCaller(createRequest, callerOptions = {}) {
      return createCaller({ logger, config, ...callerOptions, createRequest });
    },
  };
}
