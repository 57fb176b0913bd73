/**
 * Synchronous Modal Bridge
 *
 * WHY: Modal UI (dialogs, sub-screens, external activities) only reports back through callbacks.
 * ModalTask runs the trigger that presents the construct, then reenters the host loop until one
 * of the serviced callbacks signals completion, so the caller sees a single blocking call.
 * INVARIANT: The first complete()/dismiss() wins; later signals are ignored with a diagnostic.
 * INVARIANT: If the trigger throws, the loop is never reentered and the error propagates.
 *
 * Callers own liveness: every path out of the presented construct (confirm, cancel, back,
 * error) must end in complete() or dismiss(). A wait the host can no longer satisfy
 * surfaces as E-SCREEN-0201 from the loop.
 */

import { screenRuntime, selectModalDepth } from '../../state/runtime';
import { cfg } from '../config';
import { ScreenError, ScreenErrorCode } from '../errors';
import { emitTelemetryEvent } from '../telemetry';
import { createId } from '../utils';
import type { HostLoop, LoopFrame } from './hostLoop';

export type ModalState = 'created' | 'running' | 'completed';

export type ModalOutcome<T> =
  | { readonly status: 'completed'; readonly value: T }
  | { readonly status: 'dismissed' };

export type ModalTrigger<T> = (task: ModalTask<T>) => void;

export const valueOr = <T, F>(outcome: ModalOutcome<T>, fallback: F): T | F =>
  outcome.status === 'completed' ? outcome.value : fallback;

export class ModalTask<T> {
  readonly id: string;
  readonly label: string;
  /** Extra context shared between the trigger and its callbacks. */
  readonly extras = new Map<string, unknown>();

  private readonly host: HostLoop;
  private readonly trigger: ModalTrigger<T>;
  private currentState: ModalState = 'created';
  private recorded: ModalOutcome<T> | null = null;
  private frame: LoopFrame | null = null;
  private openedAt = 0;

  constructor(host: HostLoop, trigger: ModalTrigger<T>, label = 'modal') {
    this.id = createId('modal');
    this.label = label;
    this.host = host;
    this.trigger = trigger;
  }

  get state(): ModalState {
    return this.currentState;
  }

  get outcome(): ModalOutcome<T> | null {
    return this.recorded;
  }

  execute(): ModalOutcome<T> {
    if (this.currentState !== 'created') {
      throw new ScreenError(ScreenErrorCode.ModalAlreadyStarted, `Modal ${this.label} was already started`, this.id);
    }
    // Counts open modals, not loop frames: a trigger can open a modal before its own frame exists.
    const depth = selectModalDepth(screenRuntime.getState()) + 1;
    if (cfg.maxModalDepth > 0 && depth > cfg.maxModalDepth) {
      throw new ScreenError(
        ScreenErrorCode.ModalDepthExceeded,
        `Modal ${this.label} would nest ${depth} deep (max ${cfg.maxModalDepth})`,
      );
    }

    this.currentState = 'running';
    this.openedAt = Date.now();
    screenRuntime.getState().pushModal({ id: this.id, label: this.label, openedAt: this.openedAt, depth });
    emitTelemetryEvent('modal.open', { traceId: this.id, data: { label: this.label, depth } });

    try {
      try {
        this.trigger(this);
      } catch (error) {
        this.abort(error);
        throw error;
      }

      if (!this.recorded) {
        this.frame = this.host.enterFrame();
        try {
          this.host.pump(this.frame);
        } catch (error) {
          if (!this.recorded) this.abort(error);
          throw error;
        } finally {
          this.frame = null;
        }
      }
    } finally {
      screenRuntime.getState().popModal(this.id);
    }

    const outcome = this.recorded;
    if (!outcome) {
      throw new ScreenError(ScreenErrorCode.ModalStalled, `Modal ${this.label} returned without an outcome`, this.id);
    }
    return outcome;
  }

  complete(value: T): boolean {
    return this.finish({ status: 'completed', value });
  }

  dismiss(): boolean {
    return this.finish({ status: 'dismissed' });
  }

  private finish(outcome: ModalOutcome<T>): boolean {
    if (this.currentState === 'created') {
      console.warn(`[modal] ${this.label} (${this.id}) signalled before it was started; ignored`);
      return false;
    }
    if (this.recorded) {
      console.warn(`[modal] ${this.label} (${this.id}) already completed; extra ${outcome.status} signal ignored`);
      emitTelemetryEvent('modal.duplicate_completion', {
        traceId: this.id,
        data: { label: this.label, first: this.recorded.status, extra: outcome.status },
      });
      return false;
    }

    this.recorded = outcome;
    this.currentState = 'completed';
    this.frame?.quit();
    emitTelemetryEvent(outcome.status === 'completed' ? 'modal.complete' : 'modal.dismiss', {
      traceId: this.id,
      durationMs: Date.now() - this.openedAt,
      data: { label: this.label },
    });
    return true;
  }

  private abort(error: unknown): void {
    this.recorded = { status: 'dismissed' };
    this.currentState = 'completed';
    emitTelemetryEvent('modal.abort', {
      traceId: this.id,
      durationMs: Date.now() - this.openedAt,
      data: { label: this.label, error: error instanceof Error ? error.message : String(error) },
    });
  }
}

export const presentModal = <T>(host: HostLoop, trigger: ModalTrigger<T>, label?: string): ModalOutcome<T> =>
  new ModalTask<T>(host, trigger, label).execute();
