import type { ImportPhase } from '../model/ImportPhase.js';
import type { ImportResult } from '../model/ImportJob.js';
import type { ImportProgress } from '../model/ImportProgress.js';
import type { PasswordRequest } from '../model/PasswordHandshake.js';
import type { RetryPlan } from '../services/RetryPolicy.js';

/** Emitted after every successful phase transition, including same-phase re-entry. */
export interface PhaseChangedEvent {
  readonly type: 'phase:changed';
  readonly from: ImportPhase;
  readonly to: ImportPhase;
  readonly timestamp: number;
}

/** Emitted when the worker returns its result list. */
export interface BatchCompletedEvent {
  readonly type: 'batch:completed';
  readonly results: readonly ImportResult[];
  readonly timestamp: number;
}

/** Emitted when a progress snapshot passes validation and is applied. */
export interface ProgressUpdatedEvent {
  readonly type: 'progress:updated';
  readonly progress: ImportProgress;
  readonly timestamp: number;
}

/** Emitted when a progress snapshot is dropped. */
export interface ProgressRejectedEvent {
  readonly type: 'progress:rejected';
  readonly progress: ImportProgress;
  readonly reason: string;
  readonly timestamp: number;
}

/** Emitted when the worker asks for a password and the session enters `PASSWORD_INPUT`. */
export interface PasswordRequestedEvent {
  readonly type: 'password:requested';
  readonly request: PasswordRequest;
  readonly timestamp: number;
}

/** Emitted when the user goes back to choosing files. */
export interface SelectionReturnedEvent {
  readonly type: 'selection:returned';
  readonly timestamp: number;
}

/** Emitted when the user leaves the import flow altogether. */
export interface MenuReturnedEvent {
  readonly type: 'menu:returned';
  readonly timestamp: number;
}

/** Emitted when the user asks to retry part of a finished batch. */
export interface RetryRequestedEvent {
  readonly type: 'retry:requested';
  readonly plan: RetryPlan;
  readonly timestamp: number;
}

/** Discriminated union of all domain events. */
export type DomainEvent =
  | PhaseChangedEvent
  | BatchCompletedEvent
  | ProgressUpdatedEvent
  | ProgressRejectedEvent
  | PasswordRequestedEvent
  | SelectionReturnedEvent
  | MenuReturnedEvent
  | RetryRequestedEvent;

/** String literal union of all event type names. */
export type EventType = DomainEvent['type'];

/** Extract the payload type for a specific event type. */
export type EventPayload<T extends EventType> = Extract<DomainEvent, { type: T }>;
