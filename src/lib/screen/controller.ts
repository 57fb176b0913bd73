/**
 * Screen controller
 *
 * Per-screen plumbing that application screens delegate to: event routing into the screen's
 * declared handlers, modal waits on the host loop, and navigation to other screens or external
 * activities with arguments and results passed through the correlator.
 *
 * INVARIANT: A waiting presentScreen() is completed only by handleActivityResult() for
 * REQUEST_PRESENT_SCREEN; cancellations and correlator misses dismiss it.
 * INVARIANT: A started activity's pending handler runs at most once; its marker is cleared
 * from instance data on the first matching result.
 */

import { z } from 'zod';
import { IdRegistry, CommandRouter, type MenuItem } from '../dispatch/commands';
import { invokeIfSupported } from '../dispatch/dispatcher';
import { dispatchMotion, type MotionEvent } from '../dispatch/motion';
import { ScreenError, ScreenErrorCode, type Result } from '../errors';
import type { HostLoop } from '../modal/hostLoop';
import { presentModal, type ModalOutcome, type ModalTask, type ModalTrigger } from '../modal/modalTask';
import {
  correlator,
  EXTRA_ARGUMENTS_TOKEN,
  EXTRA_RESULT_TOKEN,
  EXTRA_TARGET,
  NavigationExtrasSchema,
  readToken,
  type CorrelationStore,
  type NavigationExtras,
} from '../navigation/correlator';
import { emitTelemetryEvent } from '../telemetry';
import { createId } from '../utils';

export const REQUEST_PRESENT_SCREEN = 0x5c01;
export const REQUEST_PRESENT_ACTIVITY = 0x5c02;

const STARTED_ACTIVITY_KEY = 'screenflow.startedActivity';

export type ResultCode = 'ok' | 'cancelled';

export type NavigationRequest = {
  target: string;
  extras: NavigationExtras;
};

export type NavigationResponse = {
  resultCode: ResultCode;
  extras: NavigationExtras;
};

// Host-side navigation; how requests become visible screens is the host's concern.
export interface Navigator {
  start(request: NavigationRequest, requestCode: number): void;
  finish(response: NavigationResponse): void;
}

export type ActivityResult = {
  requestCode: number;
  resultCode: ResultCode;
  data: NavigationExtras | null;
};

export interface ActivityStarter {
  handleActivityResult(result: ActivityResult): void;
}

export type LifecycleInjection = {
  pause?: () => void;
  resume?: () => void;
};

export type ScreenControllerOptions = {
  host: HostLoop;
  navigator: Navigator;
  store?: CorrelationStore;
  ids?: IdRegistry;
};

const ActivityResultSchema = z.object({
  requestCode: z.number().int(),
  resultCode: z.enum(['ok', 'cancelled']),
  data: NavigationExtrasSchema.nullable(),
});

const InstanceStateSchema = z.record(z.string(), z.unknown());

const parseInstanceState = (saved: unknown): Result<Record<string, unknown>> => {
  const parsed = InstanceStateSchema.safeParse(saved);
  if (parsed.success) return { ok: true, value: parsed.data };
  return {
    ok: false,
    error: new ScreenError(
      ScreenErrorCode.InvalidInstanceState,
      'Saved instance state must be a plain record',
      parsed.error.issues.map((issue) => issue.message).join('; '),
    ),
  };
};

export class ScreenController {
  readonly id: string;
  readonly instanceData = new Map<string, unknown>();

  private readonly screen: object;
  private readonly host: HostLoop;
  private readonly navigator: Navigator;
  private readonly store: CorrelationStore;
  private readonly ids: IdRegistry;
  private readonly injections = new Set<LifecycleInjection>();
  private readonly screenWaits: Array<ModalTask<unknown>> = [];
  private readonly activityWaits: Array<ModalTask<NavigationExtras | null>> = [];
  private router: CommandRouter | null = null;

  constructor(screen: object, options: ScreenControllerOptions) {
    this.id = createId('screen');
    this.screen = screen;
    this.host = options.host;
    this.navigator = options.navigator;
    this.store = options.store ?? correlator;
    this.ids = options.ids ?? new IdRegistry();
  }

  // instance state

  saveInstanceState(): Record<string, unknown> {
    return Object.fromEntries(this.instanceData);
  }

  restoreInstanceState(saved: unknown): void {
    if (saved === null || saved === undefined) return;
    const parsed = parseInstanceState(saved);
    if (!parsed.ok) throw parsed.error;
    this.instanceData.clear();
    for (const [key, value] of Object.entries(parsed.value)) {
      this.instanceData.set(key, value);
    }
  }

  // lifecycle injections

  addLifecycleInjection(injection: LifecycleInjection): () => void {
    this.injections.add(injection);
    return () => {
      this.removeLifecycleInjection(injection);
    };
  }

  removeLifecycleInjection(injection: LifecycleInjection): boolean {
    return this.injections.delete(injection);
  }

  runPauseInjections(): void {
    for (const injection of Array.from(this.injections)) {
      injection.pause?.();
    }
  }

  runResumeInjections(): void {
    for (const injection of Array.from(this.injections)) {
      injection.resume?.();
    }
  }

  // event routing

  /** Calls the screen's `initialize` handler whose signature matches `args` exactly. */
  invokeInitialize(args: readonly unknown[]): boolean {
    const outcome = invokeIfSupported('initialize', this.screen, ...args);
    emitTelemetryEvent(outcome.called ? 'dispatch.invoke' : 'dispatch.miss', {
      traceId: this.id,
      data: { event: 'initialize', arity: args.length },
    });
    return outcome.called;
  }

  /** Reads the presented screen's arguments out of its request extras, then initializes. */
  initializeFromExtras(extras: unknown): boolean {
    return this.invokeInitialize(this.getScreenArguments(extras) ?? []);
  }

  onOptionsItemSelected(item: MenuItem): boolean {
    if (!this.router) {
      this.router = new CommandRouter(this.screen, this.ids);
    }
    const handled = this.router.route(item);
    emitTelemetryEvent(handled ? 'dispatch.invoke' : 'dispatch.miss', {
      traceId: this.id,
      data: { event: 'command', itemId: item.itemId, command: this.ids.nameFor(item.itemId) },
    });
    return handled;
  }

  onMotionEvent(event: MotionEvent): boolean {
    return dispatchMotion(this.screen, event).called;
  }

  // modal waits and navigation

  presentModal<T>(trigger: ModalTrigger<T>, label?: string): ModalOutcome<T> {
    return presentModal(this.host, trigger, label);
  }

  /**
   * Navigates to `target` with `args` and blocks until that screen finishes.
   * Dismissed when the target is cancelled or its result can no longer be found.
   */
  presentScreen(target: string, ...args: unknown[]): ModalOutcome<unknown> {
    const token = this.store.registerArguments(args);
    try {
      return this.presentModal<unknown>((task) => {
        this.screenWaits.push(task);
        emitTelemetryEvent('navigation.start', {
          traceId: this.id,
          data: { target, requestCode: REQUEST_PRESENT_SCREEN },
        });
        this.navigator.start(
          { target, extras: { [EXTRA_TARGET]: target, [EXTRA_ARGUMENTS_TOKEN]: token } },
          REQUEST_PRESENT_SCREEN,
        );
      }, `screen:${target}`);
    } finally {
      this.pruneWaits(this.screenWaits);
      // A target that still needs the arguments retains them before it finishes.
      if (this.store.releaseArguments(token)) this.store.reclaim();
    }
  }

  /** Starts an external activity and blocks until it reports back; completes with its extras. */
  presentActivity(request: NavigationRequest): ModalOutcome<NavigationExtras | null> {
    try {
      return this.presentModal<NavigationExtras | null>((task) => {
        this.activityWaits.push(task);
        emitTelemetryEvent('navigation.start', {
          traceId: this.id,
          data: { target: request.target, requestCode: REQUEST_PRESENT_ACTIVITY },
        });
        this.navigator.start(request, REQUEST_PRESENT_ACTIVITY);
      }, `activity:${request.target}`);
    } finally {
      this.pruneWaits(this.activityWaits);
    }
  }

  getScreenArguments(extras: unknown): readonly unknown[] | undefined {
    const token = readToken(extras, EXTRA_ARGUMENTS_TOKEN);
    return token === null ? undefined : this.store.takeArguments(token);
  }

  finish(result: unknown): void {
    const token = this.store.registerResult(result);
    this.navigator.finish({ resultCode: 'ok', extras: { [EXTRA_RESULT_TOKEN]: token } });
    emitTelemetryEvent('navigation.finish', { traceId: this.id, data: { resultCode: 'ok' } });
  }

  cancel(): void {
    this.navigator.finish({ resultCode: 'cancelled', extras: {} });
    emitTelemetryEvent('navigation.finish', { traceId: this.id, data: { resultCode: 'cancelled' } });
  }

  startActivityForResult(starter: ActivityStarter, request: NavigationRequest, requestCode: number): string {
    const token = this.store.registerPendingHandler((payload) => {
      const parsed = ActivityResultSchema.safeParse(payload);
      if (!parsed.success) {
        console.warn(`[screen] activity result for ${request.target} has an unexpected shape; ignored`);
        return;
      }
      starter.handleActivityResult(parsed.data);
    });
    this.instanceData.set(STARTED_ACTIVITY_KEY, token);
    emitTelemetryEvent('navigation.start', { traceId: this.id, data: { target: request.target, requestCode } });
    this.navigator.start(request, requestCode);
    return token;
  }

  /** Host callback for every navigation result delivered to this screen. */
  handleActivityResult(requestCode: number, resultCode: ResultCode, data?: unknown): boolean {
    const extras = data === undefined ? null : NavigationExtrasSchema.safeParse(data);
    const parsedExtras = extras?.success ? extras.data : null;

    if (requestCode === REQUEST_PRESENT_SCREEN) {
      return this.completeScreenWait(resultCode, parsedExtras);
    }
    if (requestCode === REQUEST_PRESENT_ACTIVITY) {
      const task = this.activeWait(this.activityWaits);
      if (!task) {
        console.warn('[screen] activity result arrived with nothing waiting; ignored');
        return false;
      }
      emitTelemetryEvent('navigation.result', { traceId: this.id, data: { requestCode, resultCode } });
      return task.complete(parsedExtras);
    }

    const marker = this.instanceData.get(STARTED_ACTIVITY_KEY);
    this.instanceData.delete(STARTED_ACTIVITY_KEY);
    if (typeof marker !== 'string') return false;
    const dispatched = this.store.takeAndDispatch(marker, { requestCode, resultCode, data: parsedExtras });
    emitTelemetryEvent(dispatched ? 'navigation.result' : 'navigation.result_miss', {
      traceId: this.id,
      data: { requestCode, resultCode },
    });
    return dispatched;
  }

  private completeScreenWait(resultCode: ResultCode, extras: NavigationExtras | null): boolean {
    const task = this.activeWait(this.screenWaits);
    if (!task) {
      console.warn('[screen] screen result arrived with nothing waiting; ignored');
      return false;
    }
    const token = resultCode === 'ok' ? readToken(extras, EXTRA_RESULT_TOKEN) : null;
    if (token === null || !this.store.hasResult(token)) {
      emitTelemetryEvent('navigation.result_miss', {
        traceId: this.id,
        data: { requestCode: REQUEST_PRESENT_SCREEN, resultCode },
      });
      return task.dismiss();
    }
    emitTelemetryEvent('navigation.result', {
      traceId: this.id,
      data: { requestCode: REQUEST_PRESENT_SCREEN, resultCode },
    });
    return task.complete(this.store.takeResult(token));
  }

  // Innermost wait still without an outcome; finished ones linger until their presenter unwinds.
  private activeWait<T>(waits: Array<ModalTask<T>>): ModalTask<T> | undefined {
    for (let i = waits.length - 1; i >= 0; i -= 1) {
      if (waits[i].state !== 'completed') return waits[i];
    }
    return undefined;
  }

  // A wait leaves the list once its task has an outcome, however the modal ended.
  private pruneWaits<T>(waits: Array<ModalTask<T>>): void {
    for (let i = waits.length - 1; i >= 0; i -= 1) {
      if (waits[i].state === 'completed') waits.splice(i, 1);
    }
  }
}
