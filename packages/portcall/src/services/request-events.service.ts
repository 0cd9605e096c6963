import { Subject, filter, type Subscription } from 'rxjs';

import type { RequestEvent, RequestEventType, RequestListener, RequestPrimitive } from '../types/index.js';

/**
 * Listener bookkeeping shared by the request primitives of this package.
 * Each event type is a filtered view of one subject.
 */
export class RequestEvents {
  private readonly events$ = new Subject<RequestEvent>();
  private readonly subscriptions = new Map<RequestListener, Map<RequestEventType, Subscription>>();

  add(type: RequestEventType, listener: RequestListener): void {
    const byType = this.subscriptions.get(listener) ?? new Map<RequestEventType, Subscription>();

    if (byType.has(type)) {
      return;
    }

    byType.set(type, this.events$.pipe(filter((event) => event.type === type)).subscribe(listener));
    this.subscriptions.set(listener, byType);
  }

  remove(type: RequestEventType, listener: RequestListener): void {
    const byType = this.subscriptions.get(listener);
    byType?.get(type)?.unsubscribe();
    byType?.delete(type);
  }

  emit(type: RequestEventType, target: RequestPrimitive): void {
    this.events$.next({ type, target });
  }
}
