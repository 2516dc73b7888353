import { RunCanceledError } from '../errors.js';

/**
 * Cooperative cancellation primitive.
 * The extraction engine checks it between rows.
 */
export class CancelToken {
  private _canceled = false;
  private _listeners: Array<() => void> = [];

  get canceled(): boolean {
    return this._canceled;
  }

  cancel(): void {
    if (this._canceled) return;
    this._canceled = true;
    const listeners = this._listeners;
    this._listeners = [];
    for (const fn of listeners) fn();
  }

  onCancel(fn: () => void): void {
    if (this._canceled) {
      fn();
      return;
    }
    this._listeners.push(fn);
  }

  throwIfCanceled(conference?: string): void {
    if (this._canceled) {
      throw new RunCanceledError({ conference, step: 'extract' });
    }
  }
}
