import type { Receiver, ReceiveResult, Sender, TryReceiveResult } from '../domain/ports/Channel.js';

interface PendingReceiver<T> {
  readonly resolve: (result: ReceiveResult<T>) => void;
  timer?: ReturnType<typeof setTimeout>;
}

interface PendingSender<T> {
  readonly value: T;
  readonly resolve: (sent: boolean) => void;
  timer?: ReturnType<typeof setTimeout>;
}

/**
 * Bounded FIFO queue connecting one asynchronous producer to one consumer.
 *
 * A value handed to `trySend()` goes straight to a waiting receiver when there
 * is one, otherwise into the buffer if it has room. Buffered values are still
 * delivered after `close()`; only then do receivers see `closed`.
 */
export class Channel<T> implements Sender<T>, Receiver<T> {
  readonly capacity: number;

  private readonly buffer: { readonly value: T }[] = [];
  private readonly receivers: PendingReceiver<T>[] = [];
  private readonly senders: PendingSender<T>[] = [];
  private isClosed = false;

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Channel capacity must be a positive integer, got ${String(capacity)}`);
    }
    this.capacity = capacity;
  }

  get closed(): boolean {
    return this.isClosed;
  }

  get size(): number {
    return this.buffer.length;
  }

  /** `true` while at least one consumer is suspended in `receive()`. */
  get hasWaitingReceiver(): boolean {
    return this.receivers.length > 0;
  }

  trySend(value: T): boolean {
    if (this.isClosed) return false;

    const receiver = this.receivers.shift();
    if (receiver) {
      clearTimeout(receiver.timer);
      receiver.resolve({ kind: 'value', value });
      return true;
    }

    if (this.buffer.length < this.capacity) {
      this.buffer.push({ value });
      return true;
    }

    return false;
  }

  send(value: T, timeoutMs: number): Promise<boolean> {
    if (this.trySend(value)) return Promise.resolve(true);
    if (this.isClosed) return Promise.resolve(false);

    return new Promise<boolean>((resolve) => {
      const pending: PendingSender<T> = { value, resolve };
      pending.timer = setTimeout(() => {
        this.removeSender(pending);
        resolve(false);
      }, timeoutMs);
      this.senders.push(pending);
    });
  }

  tryReceive(): TryReceiveResult<T> {
    const entry = this.buffer.shift();
    if (entry) {
      this.admitWaitingSender();
      return { kind: 'value', value: entry.value };
    }
    return this.isClosed ? { kind: 'closed' } : { kind: 'empty' };
  }

  receive(timeoutMs?: number): Promise<ReceiveResult<T>> {
    const next = this.tryReceive();
    if (next.kind !== 'empty') return Promise.resolve(next);

    return new Promise<ReceiveResult<T>>((resolve) => {
      const pending: PendingReceiver<T> = { resolve };
      if (timeoutMs !== undefined) {
        pending.timer = setTimeout(() => {
          this.removeReceiver(pending);
          resolve({ kind: 'timeout' });
        }, timeoutMs);
      }
      this.receivers.push(pending);
    });
  }

  /** Idempotent. Wakes every suspended receiver and sender. */
  close(): void {
    if (this.isClosed) return;
    this.isClosed = true;

    for (const receiver of this.receivers.splice(0)) {
      clearTimeout(receiver.timer);
      receiver.resolve({ kind: 'closed' });
    }
    for (const sender of this.senders.splice(0)) {
      clearTimeout(sender.timer);
      sender.resolve(false);
    }
  }

  private admitWaitingSender(): void {
    const sender = this.senders.shift();
    if (!sender) return;
    clearTimeout(sender.timer);
    this.buffer.push({ value: sender.value });
    sender.resolve(true);
  }

  private removeReceiver(pending: PendingReceiver<T>): void {
    const index = this.receivers.indexOf(pending);
    if (index >= 0) this.receivers.splice(index, 1);
  }

  private removeSender(pending: PendingSender<T>): void {
    const index = this.senders.indexOf(pending);
    if (index >= 0) this.senders.splice(index, 1);
  }
}
