import type {
  BridgeFunction,
  LoadConfig,
  RequestFactory,
  RequestPrimitive,
} from './types/index.js';
import { createBridge, type Bridge, type BridgeOptions } from './bridge.js';
import type { FunctionNamespace } from './services/registry.service.js';
import type { InterceptedRequest } from './services/interceptor.service.js';
import type { Caller, CallerOptions } from './services/caller.service.js';

/**
 * Module-level entry point holding one default {@link Bridge}, for installer
 * scripts that expect a single global registry.
 */
export namespace portcall {
  let active: Bridge | null = null;

  const ensureInitialized = (): Bridge => {
    if (!active) {
      throw new Error('portcall.init() must be called before invoking this function.');
    }

    return active;
  };

  export function init(param: BridgeOptions = {}): Bridge {
    active = createBridge(param);
    return active;
  }

  export function bridge(): Bridge {
    return ensureInitialized();
  }

  export function register(name: string, fn: BridgeFunction): void {
    ensureInitialized().register(name, fn);
  }

  export function createNamespace(id: string, version: string): FunctionNamespace {
    return ensureInitialized().createNamespace(id, version);
  }

  export function install<T extends RequestPrimitive>(factory: RequestFactory<T>): RequestFactory<InterceptedRequest> {
    return ensureInitialized().install(factory);
  }

  export async function load(param: LoadConfig): Promise<number> {
    return ensureInitialized().load(param);
  }

  export function createCaller(createRequest: RequestFactory, options?: Omit<CallerOptions, 'createRequest'>): Caller {
    return ensureInitialized().createCaller(createRequest, options);
  }

  export function reset(): void {
    active = null;
  }
}
