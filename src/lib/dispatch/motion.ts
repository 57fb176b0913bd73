import { ARG_TYPE, type ArgType } from './argTypes';
import { EventDispatcher, type DispatchOutcome } from './dispatcher';
import { ArgumentTransformer } from './transformer';

export type MotionAction = 'down' | 'move' | 'up' | 'cancel';

export type MotionEventInit = {
  action: MotionAction;
  x: number;
  y: number;
  pointerId?: number;
  timestamp?: number;
};

export class MotionEvent {
  readonly [ARG_TYPE] = 'MotionEvent';
  readonly action: MotionAction;
  readonly x: number;
  readonly y: number;
  readonly pointerId: number;
  readonly timestamp: number;

  constructor(init: MotionEventInit) {
    this.action = init.action;
    this.x = init.x;
    this.y = init.y;
    this.pointerId = init.pointerId ?? 0;
    this.timestamp = init.timestamp ?? Date.now();
  }
}

const isMotionEvent = (value: unknown): value is MotionEvent => value instanceof MotionEvent;

// (MotionEvent) -> (number, number), so handlers can take plain coordinates.
export const createXYTransformer = (): ArgumentTransformer =>
  new ArgumentTransformer(
    ['MotionEvent'],
    ['number', 'number'],
    (args) => {
      const [event] = args;
      if (!isMotionEvent(event)) {
        throw new TypeError('xy transformer expects a MotionEvent');
      }
      return [event.x, event.y];
    },
    'motion-xy',
  );

export class MotionEventDispatcher extends EventDispatcher {
  private xyTransformer: ArgumentTransformer | null = null;

  protected override lookupTransformers(receiver: object, argTypes: readonly ArgType[]): ArgumentTransformer[] {
    const transformers = super.lookupTransformers(receiver, argTypes);
    return this.getXYTransformer().addIfSupportedBy(receiver, this.eventName, argTypes, transformers);
  }

  protected getXYTransformer(): ArgumentTransformer {
    if (!this.xyTransformer) {
      this.xyTransformer = createXYTransformer();
    }
    return this.xyTransformer;
  }
}

const MOTION_HANDLER_NAMES: Record<MotionAction, string> = {
  down: 'onTouchDown',
  move: 'onTouchMove',
  up: 'onTouchUp',
  cancel: 'onTouchCancel',
};

export const motionHandlerName = (action: MotionAction): string => MOTION_HANDLER_NAMES[action];

const motionDispatchers = new Map<MotionAction, MotionEventDispatcher>();

export const motionDispatcherFor = (action: MotionAction): MotionEventDispatcher => {
  let dispatcher = motionDispatchers.get(action);
  if (!dispatcher) {
    dispatcher = new MotionEventDispatcher(motionHandlerName(action));
    motionDispatchers.set(action, dispatcher);
  }
  return dispatcher;
};

export const dispatchMotion = (receiver: object, event: MotionEvent): DispatchOutcome =>
  motionDispatcherFor(event.action).invoke(receiver, event);
