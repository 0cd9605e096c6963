import type { NamespaceRef, QualifiedName, RegistrationErrorCode } from '../types/index.js';

export const FUNCTION_NAME_PATTERN = /^\w+$/;
export const NAMESPACE_ID_PATTERN = /^[\w-]+\/[\w-]+$/;
export const NAMESPACE_VERSION_PATTERN = /^[\w.-]+$/;

/**
 * Raised at setup time when a function or namespace cannot be registered.
 * Calls never raise this; it only signals installer mistakes.
 */
export class RegistrationError extends Error {
  readonly code: RegistrationErrorCode;

  constructor(code: RegistrationErrorCode, message: string) {
    super(message);
    this.name = 'RegistrationError';
    this.code = code;
  }
}

export function assertFunctionName(name: string): void {
  if (!FUNCTION_NAME_PATTERN.test(name)) {
    throw new RegistrationError('InvalidName', `Invalid function name: "${name}"`);
  }
}

export function assertNamespaceId(id: string): void {
  if (!NAMESPACE_ID_PATTERN.test(id)) {
    throw new RegistrationError('InvalidNamespace', `Invalid namespace "${id}", expected "author/package"`);
  }
}

export function assertNamespaceVersion(version: unknown): asserts version is string {
  if (typeof version !== 'string' || !NAMESPACE_VERSION_PATTERN.test(version)) {
    throw new RegistrationError('InvalidVersion', `Invalid namespace version: ${typeof version === 'string' ? `"${version}"` : typeof version}`);
  }
}

/** Builds a validated {@link QualifiedName}. */
export function qualify(name: string, namespace?: NamespaceRef): QualifiedName {
  assertFunctionName(name);

  if (!namespace) {
    return { name };
  }

  assertNamespaceId(namespace.id);
  assertNamespaceVersion(namespace.version);
  return { name, namespace: { id: namespace.id, version: namespace.version } };
}

export function formatQualifiedName({ name, namespace }: QualifiedName): string {
  return namespace ? `${namespace.id}@${namespace.version}/${name}` : name;
}
