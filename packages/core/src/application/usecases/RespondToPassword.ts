import type { PasswordResponse } from '../../domain/model/PasswordHandshake.js';
import type { OperationResult } from '../../domain/errors/ImportFlowError.js';
import { ImportPhase, phaseLabel } from '../../domain/model/ImportPhase.js';
import { fail } from '../../domain/errors/ImportFlowError.js';
import type { ImportFlowContext } from '../ImportFlowContext.js';

/**
 * Use case: answer the pending password request (submit, cancel or skip).
 *
 * The send never waits. It fails unless the worker is suspended in
 * `receive()` and has not queued a newer request, so an answer given after
 * the worker timed out is never read for another file.
 */
export class RespondToPassword {
  constructor(private readonly ctx: ImportFlowContext) {}

  execute(response: PasswordResponse): OperationResult {
    if (this.ctx.phase !== ImportPhase.PASSWORD_INPUT) {
      return fail('INVALID_PHASE', `No password is expected in phase ${phaseLabel(this.ctx.phase)}`);
    }

    const responses = this.ctx.passwordResponseChannel;
    if (!responses.hasWaitingReceiver) {
      return fail('CHANNEL_UNAVAILABLE', 'Worker is not waiting for a password');
    }
    if (this.ctx.passwordRequestChannel.size > 0) {
      return fail('CHANNEL_UNAVAILABLE', 'Password request was superseded by a newer one');
    }
    if (!responses.trySend(response)) {
      return fail('CHANNEL_UNAVAILABLE', 'Password response channel is unavailable');
    }

    this.ctx.pendingPassword = null;
    return this.ctx.transitionTo(ImportPhase.IMPORTING);
  }
}
