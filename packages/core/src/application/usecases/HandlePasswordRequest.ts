import type { PasswordRequest } from '../../domain/model/PasswordHandshake.js';
import type { OperationResult } from '../../domain/errors/ImportFlowError.js';
import { ImportPhase } from '../../domain/model/ImportPhase.js';
import type { ImportFlowContext } from '../ImportFlowContext.js';

/** Use case: store a worker's password request and open the prompt. */
export class HandlePasswordRequest {
  constructor(private readonly ctx: ImportFlowContext) {}

  execute(request: PasswordRequest): OperationResult {
    const previous = this.ctx.pendingPassword;
    this.ctx.pendingPassword = request;

    const result = this.ctx.transitionTo(ImportPhase.PASSWORD_INPUT);
    if (!result.ok) {
      this.ctx.pendingPassword = previous;
      return result;
    }

    this.ctx.eventBus.emit({ type: 'password:requested', request, timestamp: Date.now() });
    return result;
  }
}
