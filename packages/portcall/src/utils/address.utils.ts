import type { ParsedAddress, QualifiedName } from '../types/index.js';

export const PROTOCOL_VERSION = '1.0.0';
export const ADDRESS_SCHEME = 'portcall:';
export const ADDRESS_PREFIX = `${ADDRESS_SCHEME}//`;

const ADDRESS_PATTERN = /^portcall:\/\/([\w-]+\/[\w-]+)?\/(\w+)\?v=(\d+\.\d+\.\d+)(?:&nsv=([\w.-]+))?$/;

/**
 * default namespace: `portcall:///name?v=1.0.0`
 * named namespace:   `portcall://author/package/name?v=1.0.0&nsv=2.1`
 */
export function encodeAddress(qualified: QualifiedName, protocolVersion = PROTOCOL_VERSION): string {
  const { name, namespace } = qualified;

  if (!namespace) {
    return `${ADDRESS_PREFIX}/${name}?v=${protocolVersion}`;
  }

  return `${ADDRESS_PREFIX}${namespace.id}/${name}?v=${protocolVersion}&nsv=${namespace.version}`;
}

export function encodeArgument(argument: unknown): string {
  return JSON.stringify(argument ?? null);
}

export function isBridgeAddress(url: string): boolean {
  return url.startsWith(ADDRESS_PREFIX);
}

/** Returns `undefined` when the address is malformed, including a namespace given without `nsv`. */
export function parseAddress(url: string): ParsedAddress | undefined {
  const match = ADDRESS_PATTERN.exec(url);

  if (!match) {
    return undefined;
  }

  const [, namespaceId, functionName, protocolVersion, namespaceVersion] = match;

  if (!functionName || !protocolVersion) {
    return undefined;
  }

  if (namespaceId !== undefined && namespaceVersion === undefined) {
    return undefined;
  }

  return { protocolVersion, functionName, namespaceId, namespaceVersion };
}

/** Status codes written on intercepted requests, one per outcome band. */
export const StatusCode = {
  OK: 200,
  BAD_REQUEST: 400,
  NOT_FOUND: 404,
  CALL_ERROR: 500,
} as const;

export type StatusCode = (typeof StatusCode)[keyof typeof StatusCode];
