import type {
  RequestEventType,
  RequestFactory,
  RequestListener,
  RequestPrimitive,
  ResponseKind,
} from '../types/index.js';
import { ReadyState } from '../types/index.js';
import { RequestEvents } from '../services/request-events.service.js';

/**
 * XMLHttpRequest-like request object for Node.js, backed by the global `fetch`.
 * Only asynchronous requests are supported; the response is always read as text.
 */
export class FetchRequest implements RequestPrimitive {
  readyState: number = ReadyState.UNSENT;
  status = 0;
  responseType: ResponseKind = '';
  response: unknown = null;
  responseText = '';

  private readonly events = new RequestEvents();
  private readonly headers = new Headers();
  private method = 'GET';
  private url = '';

  open(method: string, url: string): void {
    this.method = method.toUpperCase();
    this.url = url;
    this.status = 0;
    this.response = null;
    this.responseText = '';
    this.readyState = ReadyState.OPENED;
  }

  setRequestHeader(name: string, value: string): void {
    this.headers.append(name, value);
  }

  send(body?: string | null): void {
    const hasBody = body !== undefined && body !== null && this.method !== 'GET' && this.method !== 'HEAD';

    this.perform(hasBody ? body : undefined).catch(() => {
      this.status = 0;
      this.readyState = ReadyState.DONE;
      this.events.emit('error', this);
      this.events.emit('loadend', this);
    });
  }

  addEventListener(type: RequestEventType, listener: RequestListener): void {
    this.events.add(type, listener);
  }

  removeEventListener(type: RequestEventType, listener: RequestListener): void {
    this.events.remove(type, listener);
  }

  private async perform(body: string | undefined): Promise<void> {
    const res = await fetch(this.url, { method: this.method, headers: this.headers, body });
    const text = await res.text();

    this.status = res.status;
    this.responseText = text;
    this.response = text;
    this.responseType = 'text';
    this.readyState = ReadyState.DONE;
    this.events.emit('load', this);
    this.events.emit('loadend', this);
  }
}

export const createFetchRequest: RequestFactory<FetchRequest> = () => new FetchRequest();
