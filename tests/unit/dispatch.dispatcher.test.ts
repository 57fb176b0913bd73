import { describe, it, expect, vi } from 'vitest';
import { ScreenError } from '../../src/lib/errors';
import { dispatch, EventDispatcher, invokeIfSupported, NOT_CALLED } from '../../src/lib/dispatch/dispatcher';
import type { HandlerDeclarations } from '../../src/lib/dispatch/handlers';
import { ArgumentTransformer } from '../../src/lib/dispatch/transformer';

const captureError = (fn: () => unknown): unknown => {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
};

class CounterScreen {
  static handlers: HandlerDeclarations = {
    onIncrement: [['number']],
    onReset: [[]],
    onFailure: [[]],
    onRawThrow: [['string']],
  };

  count = 0;
  readonly failure = new Error('boom');

  onIncrement(step: number): number {
    this.count += step;
    return this.count;
  }

  onReset(): void {
    this.count = 0;
  }

  onFailure(): void {
    throw this.failure;
  }

  onRawThrow(value: string): void {
    throw value;
  }
}

class BrokenTransformDispatcher extends EventDispatcher {
  protected override lookupTransformers(): ArgumentTransformer[] {
    return [new ArgumentTransformer(['string'], ['number'], () => [], 'drops-everything')];
  }
}

describe('dispatch.dispatcher', () => {
  it('invokes the matching handler bound to the receiver', () => {
    const screen = new CounterScreen();
    expect(dispatch('onIncrement', screen, 2)).toBe(true);
    expect(invokeIfSupported('onIncrement', screen, 3)).toEqual({ called: true, value: 5 });
    expect(screen.count).toBe(5);
  });

  it('reports NOT_CALLED for missing handlers and mismatched shapes', () => {
    const screen = new CounterScreen();
    expect(invokeIfSupported('onDecrement', screen, 1)).toBe(NOT_CALLED);
    expect(dispatch('onIncrement', screen, '2')).toBe(false);
    expect(dispatch('onIncrement', screen)).toBe(false);
    expect(screen.count).toBe(0);
  });

  it('answers supportedBy without calling anything', () => {
    const screen = new CounterScreen();
    const dispatcher = new EventDispatcher('onReset');
    screen.count = 4;
    expect(dispatcher.supportedBy(screen)).toBe(true);
    expect(dispatcher.supportedBy(screen, 1)).toBe(false);
    expect(screen.count).toBe(4);
  });

  it('agrees with invoke when an instance hides a declared method', () => {
    const screen = new CounterScreen();
    Object.defineProperty(screen, 'onReset', { value: 5 });
    screen.count = 4;
    const dispatcher = new EventDispatcher('onReset');

    expect(dispatcher.supportedBy(screen)).toBe(false);
    expect(dispatcher.invoke(screen)).toBe(NOT_CALLED);
    expect(screen.count).toBe(4);
  });

  it('rethrows handler errors unchanged', () => {
    const screen = new CounterScreen();
    const error = captureError(() => dispatch('onFailure', screen));
    expect(error).toBe(screen.failure);
  });

  it('wraps non-Error throwables once', () => {
    const error = captureError(() => dispatch('onRawThrow', new CounterScreen(), 'nope'));
    expect(error).toBeInstanceOf(ScreenError);
    expect(error).toMatchObject({
      code: 'E-SCREEN-0101',
      message: 'Handler onRawThrow threw a non-Error value',
      detail: 'nope',
      cause: 'nope',
    });
  });

  it('treats transform failures as not handled', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const screen = new CounterScreen();
    const outcome = new BrokenTransformDispatcher('onIncrement').invoke(screen, '7');

    expect(outcome).toBe(NOT_CALLED);
    expect(screen.count).toBe(0);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith(
      '[dispatch] resolution of onIncrement failed; ignored',
      expect.objectContaining({ code: 'E-SCREEN-0102' }),
    );
  });
});
