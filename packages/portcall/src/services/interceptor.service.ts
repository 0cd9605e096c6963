import type {
  Logger,
  RequestEventType,
  RequestFactory,
  RequestListener,
  RequestPrimitive,
  ResponseKind,
} from '../types/index.js';
import { ReadyState } from '../types/index.js';
import { StatusCode, isBridgeAddress } from '../utils/address.utils.js';
import { describeError, safeString, serializeError } from '../utils/error.utils.js';
import { Dispatcher, type Completion, type Resolution } from './dispatcher.service.js';
import { RequestEvents } from './request-events.service.js';

type InterceptState =
  | { kind: 'unintercepted' }
  | { kind: 'intercepted'; resolution: Resolution }
  | { kind: 'dispatching' }
  | { kind: 'completed'; completion: Completion };

const FORWARDED_EVENTS: RequestEventType[] = ['load', 'error', 'loadend'];

/**
 * Decorates a host request object. Requests opened on a bridge address are
 * answered by the dispatcher; every other request is forwarded untouched and
 * its events are re-emitted with this object as their target.
 */
export class InterceptedRequest implements RequestPrimitive {
  private state: InterceptState = { kind: 'unintercepted' };
  private readonly events = new RequestEvents();

  constructor(
    private readonly inner: RequestPrimitive,
    private readonly dispatcher: Dispatcher,
    private readonly logger: Logger,
  ) {
    for (const type of FORWARDED_EVENTS) {
      inner.addEventListener(type, () => {
        if (this.state.kind === 'unintercepted') {
          this.events.emit(type, this);
        }
      });
    }
  }

  get intercepted(): boolean {
    return this.state.kind !== 'unintercepted';
  }

  get readyState(): number {
    switch (this.state.kind) {
      case 'unintercepted':
        return this.inner.readyState;
      case 'completed':
        return ReadyState.DONE;
      default:
        return ReadyState.OPENED;
    }
  }

  get status(): number {
    if (this.state.kind === 'unintercepted') {
      return this.inner.status;
    }

    return this.state.kind === 'completed' ? this.state.completion.status : 0;
  }

  get response(): unknown {
    if (this.state.kind === 'unintercepted') {
      return this.inner.response;
    }

    return this.state.kind === 'completed' ? this.state.completion.body : null;
  }

  get responseText(): string {
    if (this.state.kind === 'unintercepted') {
      return this.inner.responseText;
    }

    return this.state.kind === 'completed' ? this.state.completion.body : '';
  }

  get responseType(): ResponseKind {
    if (this.state.kind === 'unintercepted') {
      return this.inner.responseType;
    }

    return this.state.kind === 'completed' ? this.state.completion.responseType : '';
  }

  open(method: string, url: string, async?: boolean, user?: string | null, password?: string | null): void {
    this.state = isBridgeAddress(url)
      ? { kind: 'intercepted', resolution: this.dispatcher.resolve(url) }
      : { kind: 'unintercepted' };

    // the host object is opened either way so it stays in a valid state
    this.inner.open(method, url, async, user, password);
  }

  setRequestHeader(name: string, value: string): void {
    this.inner.setRequestHeader(name, value);
  }

  send(body?: string | null): void {
    const { state } = this;

    if (state.kind === 'unintercepted') {
      this.inner.send(body);
      return;
    }

    if (state.kind !== 'intercepted') {
      this.logger.warn('send() called twice on a portcall request; ignoring', { state: state.kind });
      return;
    }

    const { resolution } = state;

    if (resolution.kind !== 'resolved') {
      this.complete(this.dispatcher.reject(resolution));
      return;
    }

    const decoded = this.dispatcher.decode(resolution, body);

    if (decoded.kind !== 'decoded') {
      this.complete(this.dispatcher.reject(decoded));
      return;
    }

    this.state = { kind: 'dispatching' };
    this.dispatcher.invoke(resolution, decoded.argument).then(
      (completion) => this.complete(completion),
      (error) => {
        // invoke() settles every outcome itself; reaching this means a bug in the bridge
        this.logger.error('portcall dispatch failed unexpectedly', { error: safeString(error) });
        this.complete({ status: StatusCode.CALL_ERROR, responseType: 'json', body: serializeError(describeError(error)) });
      },
    );
  }

  addEventListener(type: RequestEventType, listener: RequestListener): void {
    this.events.add(type, listener);
  }

  removeEventListener(type: RequestEventType, listener: RequestListener): void {
    this.events.remove(type, listener);
  }

  private complete(completion: Completion): void {
    this.state = { kind: 'completed', completion };
    this.events.emit('load', this);
    this.events.emit('loadend', this);
  }
}

/**
 * Wraps a request factory so that every request it creates goes through the bridge.
 * Requests that are already intercepted are handed out as they are.
 */
export function interceptRequests<T extends RequestPrimitive>(
  factory: RequestFactory<T>,
  dispatcher: Dispatcher,
  logger: Logger,
): RequestFactory<InterceptedRequest> {
  return () => {
    const request = factory();
    return request instanceof InterceptedRequest ? request : new InterceptedRequest(request, dispatcher, logger);
  };
}
