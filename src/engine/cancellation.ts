/**
 * Cooperative cancellation.
 *
 * The scheduler consults the token only at dispatch boundaries; running
 * operations are never interrupted.
 */

import { CancellationRequest } from '../domain/run';

export type CancellationListener = (request: CancellationRequest) => void;

export class CancellationToken {
  private request?: CancellationRequest;
  private listeners = new Set<CancellationListener>();

  get isCancelled(): boolean {
    return this.request !== undefined;
  }

  get cancellation(): CancellationRequest | undefined {
    return this.request;
  }

  /** Request cancellation. Later requests are ignored. */
  cancel(requestedBy: string, reason?: string): void {
    if (this.request) return;
    this.request = { requestedBy, requestedAt: new Date().toISOString(), reason };
    const request = this.request;
    for (const listener of [...this.listeners]) listener(request);
  }

  /** Subscribe; returns an unsubscribe function. */
  onCancel(listener: CancellationListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }
}
