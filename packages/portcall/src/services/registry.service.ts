import type { BridgeFunction, Logger } from '../types/index.js';
import {
  RegistrationError,
  assertFunctionName,
  assertNamespaceId,
  assertNamespaceVersion,
} from '../utils/validation.utils.js';
import { PROTOCOL_VERSION } from '../utils/address.utils.js';

/**
 * Versioned set of functions. Functions can be added but never removed or replaced.
 */
export class FunctionNamespace {
  private readonly functions = new Map<string, BridgeFunction>();

  constructor(
    readonly version: string,
    readonly id?: string,
  ) {
    assertNamespaceVersion(version);
  }

  register(name: string, fn: BridgeFunction): void {
    assertFunctionName(name);

    if (this.functions.has(name)) {
      throw new RegistrationError('DuplicateName', `${name} is already used${this.id ? ` in ${this.id}` : ''}`);
    }

    this.functions.set(name, fn);
  }

  find(name: string): BridgeFunction | undefined {
    return this.functions.get(name);
  }

  names(): string[] {
    return Array.from(this.functions.keys());
  }
}

export class FunctionRegistry {
  readonly defaultNamespace = new FunctionNamespace(PROTOCOL_VERSION);
  private readonly namespaces = new Map<string, FunctionNamespace>();

  constructor(private readonly logger?: Logger) {}

  register(name: string, fn: BridgeFunction): void {
    this.defaultNamespace.register(name, fn);
  }

  /**
   * Creates an empty namespace under `id`. An existing namespace with the same id
   * is replaced and its functions stop being reachable.
   */
  createNamespace(id: string, version: string): FunctionNamespace {
    assertNamespaceId(id);
    assertNamespaceVersion(version);

    const previous = this.namespaces.get(id);

    if (previous) {
      this.logger?.warn('Namespace replaced; previously registered functions are no longer callable', {
        namespace: id,
        previousVersion: previous.version,
        version,
        orphaned: previous.names(),
      });
    }

    const namespace = new FunctionNamespace(version, id);
    this.namespaces.set(id, namespace);
    return namespace;
  }

  namespace(id: string): FunctionNamespace | undefined {
    return this.namespaces.get(id);
  }

  namespaceIds(): string[] {
    return Array.from(this.namespaces.keys());
  }
}
