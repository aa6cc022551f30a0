import type { ImportProgress } from '../domain/model/ImportProgress.js';
import type { PasswordRequest } from '../domain/model/PasswordHandshake.js';
import { ImportPhase } from '../domain/model/ImportPhase.js';
import type { ImportFlowContext } from './ImportFlowContext.js';

export type ProgressListenResult =
  | { readonly kind: 'progress:update'; readonly progress: ImportProgress }
  | { readonly kind: 'listen:continue' }
  | { readonly kind: 'listen:closed' };

export type PasswordListenResult =
  | { readonly kind: 'password:request'; readonly request: PasswordRequest }
  | { readonly kind: 'listen:idle' }
  | { readonly kind: 'listen:closed' };

/**
 * One-shot polls on the session channels for a UI loop.
 *
 * Each call waits at most one poll interval. A timeout is not an ending: the
 * caller re-arms the poll for as long as `shouldKeepListening()` holds.
 */
export class ImportListener {
  constructor(
    private readonly ctx: ImportFlowContext,
    private readonly progressPollTimeoutMs: number,
    private readonly passwordPollTimeoutMs: number,
  ) {}

  async listenForProgressUpdates(): Promise<ProgressListenResult> {
    const received = await this.ctx.progressChannel.receive(this.progressPollTimeoutMs);
    switch (received.kind) {
      case 'value':
        return { kind: 'progress:update', progress: received.value };
      case 'timeout':
        return { kind: 'listen:continue' };
      case 'closed':
        return { kind: 'listen:closed' };
    }
  }

  async listenForPasswordRequests(): Promise<PasswordListenResult> {
    const received = await this.ctx.passwordRequestChannel.receive(this.passwordPollTimeoutMs);
    switch (received.kind) {
      case 'value':
        return { kind: 'password:request', request: received.value };
      case 'timeout':
        return { kind: 'listen:idle' };
      case 'closed':
        return { kind: 'listen:closed' };
    }
  }

  /** `true` while a batch is running, including while it waits for a password. */
  shouldKeepListening(): boolean {
    return this.ctx.phase === ImportPhase.IMPORTING || this.ctx.phase === ImportPhase.PASSWORD_INPUT;
  }
}
