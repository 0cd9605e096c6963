export type RequestEventType = 'load' | 'error' | 'loadend';
export type ResponseKind = '' | 'text' | 'json';

export type RequestEvent = {
  type: RequestEventType;
  target: RequestPrimitive;
};

export type RequestListener = (event: RequestEvent) => void;

/**
 * The subset of XMLHttpRequest the bridge relies on. Any host request object
 * exposing these members can be decorated by the interceptor.
 */
export interface RequestPrimitive {
  readonly readyState: number;
  readonly status: number;
  readonly responseType: ResponseKind;
  readonly response: unknown;
  readonly responseText: string;
  open(method: string, url: string, async?: boolean, user?: string | null, password?: string | null): void;
  setRequestHeader(name: string, value: string): void;
  send(body?: string | null): void;
  addEventListener(type: RequestEventType, listener: RequestListener): void;
  removeEventListener(type: RequestEventType, listener: RequestListener): void;
}

export type RequestFactory<T extends RequestPrimitive = RequestPrimitive> = () => T;

export const ReadyState = {
  UNSENT: 0,
  OPENED: 1,
  HEADERS_RECEIVED: 2,
  LOADING: 3,
  DONE: 4,
} as const;
