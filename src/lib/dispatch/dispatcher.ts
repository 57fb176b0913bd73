/**
 * Dynamic Dispatcher
 *
 * WHY: Routes a named UI event to whichever handler the receiver declares for the event's
 * argument shape, adapting the arguments through transformers when needed.
 * INVARIANT: A missing handler is not an error; invoke() reports NOT_CALLED.
 * INVARIANT: Errors thrown by the handler reach the caller unchanged (non-Error throwables
 * are wrapped once). Failures inside resolution are logged and treated as NOT_CALLED.
 */

import { wrapHandlerFailure } from '../errors';
import { argTypesOf, type ArgType } from './argTypes';
import type { HandlerCall } from './handlers';
import { resolveHandler, type Candidate } from './resolver';
import type { ArgumentTransformer } from './transformer';

export const NOT_CALLED = Object.freeze({ called: false as const });

export type DispatchOutcome = { readonly called: true; readonly value: unknown } | typeof NOT_CALLED;

type PreparedCall = {
  readonly call: HandlerCall;
  readonly args: readonly unknown[];
};

export class EventDispatcher {
  readonly eventName: string;

  constructor(eventName: string) {
    this.eventName = eventName;
  }

  /**
   * Transformers this dispatcher can apply for the given receiver and raw argument types.
   * Subclasses extend the list; the base dispatcher only knows identity.
   */
  protected lookupTransformers(_receiver: object, _argTypes: readonly ArgType[]): ArgumentTransformer[] {
    return [];
  }

  resolve(receiver: object, argTypes: readonly ArgType[]): Candidate | null {
    const transformers = this.lookupTransformers(receiver, argTypes);
    return resolveHandler(this.eventName, receiver, argTypes, transformers);
  }

  supportedBy(receiver: object, ...args: unknown[]): boolean {
    try {
      return this.resolve(receiver, argTypesOf(args)) !== null;
    } catch (error) {
      this.reportResolutionFailure(error);
      return false;
    }
  }

  invoke(receiver: object, ...args: unknown[]): DispatchOutcome {
    const prepared = this.prepare(receiver, args);
    if (!prepared) return NOT_CALLED;
    try {
      return { called: true, value: prepared.call(prepared.args) };
    } catch (error) {
      throw wrapHandlerFailure(error, this.eventName);
    }
  }

  callMethodOn(receiver: object, ...args: unknown[]): boolean {
    return this.invoke(receiver, ...args).called;
  }

  private prepare(receiver: object, args: readonly unknown[]): PreparedCall | null {
    try {
      const candidate = this.resolve(receiver, argTypesOf(args));
      if (!candidate) return null;
      const call = candidate.entry.bind(receiver);
      if (!call) return null;
      return { call, args: candidate.transformer ? candidate.transformer.transform(args) : args };
    } catch (error) {
      this.reportResolutionFailure(error);
      return null;
    }
  }

  private reportResolutionFailure(error: unknown): void {
    console.warn(`[dispatch] resolution of ${this.eventName} failed; ignored`, error);
  }
}

const dispatchers = new Map<string, EventDispatcher>();

const dispatcherFor = (eventName: string): EventDispatcher => {
  let dispatcher = dispatchers.get(eventName);
  if (!dispatcher) {
    dispatcher = new EventDispatcher(eventName);
    dispatchers.set(eventName, dispatcher);
  }
  return dispatcher;
};

export const dispatch = (eventName: string, receiver: object, ...args: unknown[]): boolean =>
  dispatcherFor(eventName).callMethodOn(receiver, ...args);

export const invokeIfSupported = (eventName: string, receiver: object, ...args: unknown[]): DispatchOutcome =>
  dispatcherFor(eventName).invoke(receiver, ...args);
