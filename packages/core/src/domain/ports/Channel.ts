/** Result of a waiting receive. */
export type ReceiveResult<T> =
  | { readonly kind: 'value'; readonly value: T }
  | { readonly kind: 'timeout' }
  | { readonly kind: 'closed' };

/** Result of a non-waiting receive. */
export type TryReceiveResult<T> =
  | { readonly kind: 'value'; readonly value: T }
  | { readonly kind: 'empty' }
  | { readonly kind: 'closed' };

/** Write half of a channel. */
export interface Sender<T> {
  readonly closed: boolean;
  /** Deliver without waiting. Returns `false` when the channel is full or closed. */
  trySend(value: T): boolean;
  /** Wait up to `timeoutMs` for room. Resolves `false` on timeout or close. */
  send(value: T, timeoutMs: number): Promise<boolean>;
  close(): void;
}

/** Read half of a channel. */
export interface Receiver<T> {
  readonly closed: boolean;
  /** Number of buffered values. */
  readonly size: number;
  /** Wait for a value. Without `timeoutMs` this waits until a value arrives or the channel closes. */
  receive(timeoutMs?: number): Promise<ReceiveResult<T>>;
  tryReceive(): TryReceiveResult<T>;
}
