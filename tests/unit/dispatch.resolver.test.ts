import { describe, it, expect } from 'vitest';
import { ScreenError } from '../../src/lib/errors';
import {
  handlerSignaturesOf,
  hasHandler,
  lookupHandler,
  registerHandler,
  type HandlerDeclarations,
} from '../../src/lib/dispatch/handlers';
import { createXYTransformer } from '../../src/lib/dispatch/motion';
import { resolveCandidates, resolveHandler } from '../../src/lib/dispatch/resolver';
import { ArgumentTransformer } from '../../src/lib/dispatch/transformer';

const captureError = (fn: () => unknown): unknown => {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
};

class BaseScreen {
  static handlers: HandlerDeclarations = {
    onTouchMove: [['MotionEvent'], ['number', 'number']],
    onValue: [['number'], ['boolean']],
  };

  onTouchMove(..._args: unknown[]): void {}

  onValue(_value: number | boolean): void {}
}

class DetailScreen extends BaseScreen {
  static handlers: HandlerDeclarations = {
    refreshClicked: [[]],
  };

  refreshClicked(): void {}
}

class XYOnlyScreen {
  static handlers: HandlerDeclarations = { onTouchMove: [['number', 'number']] };

  onTouchMove(_x: number, _y: number): void {}
}

describe('dispatch.resolver', () => {
  it('puts the identity match ahead of transformed matches', () => {
    const candidates = resolveCandidates('onTouchMove', new BaseScreen(), ['MotionEvent'], [createXYTransformer()]);
    expect(candidates).toHaveLength(2);
    expect(candidates[0].transformer).toBeNull();
    expect(candidates[0].entry.params).toEqual(['MotionEvent']);
    expect(candidates[1].transformer?.label).toBe('motion-xy');
    expect(candidates[1].entry.params).toEqual(['number', 'number']);
  });

  it('falls back to a transformer when only the adapted shape is declared', () => {
    const candidate = resolveHandler('onTouchMove', new XYOnlyScreen(), ['MotionEvent'], [createXYTransformer()]);
    expect(candidate?.transformer?.label).toBe('motion-xy');
    expect(candidate?.entry.params).toEqual(['number', 'number']);
  });

  it('keeps the first viable transformer in registration order', () => {
    const toNumber = new ArgumentTransformer(['string'], ['number'], (args) => [Number(args[0])], 'to-number');
    const toBoolean = new ArgumentTransformer(['string'], ['boolean'], (args) => [args[0] === 'true'], 'to-boolean');
    const screen = new BaseScreen();

    expect(resolveHandler('onValue', screen, ['string'], [toNumber, toBoolean])?.transformer?.label).toBe('to-number');
    expect(resolveHandler('onValue', screen, ['string'], [toBoolean, toNumber])?.transformer?.label).toBe('to-boolean');
  });

  it('returns null when nothing matches', () => {
    expect(resolveHandler('onTouchMove', new XYOnlyScreen(), ['MotionEvent'], [])).toBeNull();
    expect(resolveCandidates('onMissing', new BaseScreen(), [], [])).toEqual([]);
  });

  it('merges declarations along the class chain', () => {
    const screen = new DetailScreen();
    expect(hasHandler(screen, 'onValue', ['number'])).toBe(true);
    expect(hasHandler(screen, 'refreshClicked', [])).toBe(true);
    expect(hasHandler(new BaseScreen(), 'refreshClicked', [])).toBe(false);
    expect(handlerSignaturesOf(screen, 'onTouchMove')).toEqual([['MotionEvent'], ['number', 'number']]);
  });

  it('rejects a declaration without a matching method', () => {
    class Broken {
      static handlers: HandlerDeclarations = { missingClicked: [[]] };
    }
    const error = captureError(() => hasHandler(new Broken(), 'missingClicked', []));
    expect(error).toBeInstanceOf(ScreenError);
    expect(error).toMatchObject({ code: 'E-SCREEN-0103', message: 'Declared handler missingClicked is not a method' });
  });

  it('rejects non-public handler names', () => {
    class Hidden {
      static handlers: HandlerDeclarations = { _secret: [[]] };

      _secret(): void {}
    }
    const error = captureError(() => hasHandler(new Hidden(), '_secret', []));
    expect(error).toMatchObject({ code: 'E-SCREEN-0103', message: 'Invalid handler declarations on Hidden' });
  });

  it('lets instance registrations shadow class entries until unregistered', () => {
    const screen = new BaseScreen();
    const unregister = registerHandler(screen, 'onValue', ['number'], () => 'instance');
    expect(lookupHandler(screen, 'onValue', ['number'])?.source).toBe('instance');

    unregister();
    expect(lookupHandler(screen, 'onValue', ['number'])?.source).toBe('class');
    expect(lookupHandler(new BaseScreen(), 'onValue', ['number'])?.source).toBe('class');
  });

  it('skips entries whose method the receiver no longer exposes', () => {
    const screen = new BaseScreen();
    Object.defineProperty(screen, 'onValue', { value: 'not a method' });
    const parse = new ArgumentTransformer(['string'], ['number'], (args) => [Number(args[0])], 'parse');

    expect(resolveHandler('onValue', screen, ['number'], [])).toBeNull();
    expect(resolveCandidates('onValue', screen, ['string'], [parse])).toEqual([]);
    expect(resolveHandler('onValue', new BaseScreen(), ['string'], [parse])?.transformer).toBe(parse);
  });

  it('resolves a raw motion event by its tag', () => {
    const candidate = resolveHandler('onTouchMove', new BaseScreen(), ['MotionEvent'], []);
    expect(candidate?.entry.name).toBe('onTouchMove');
    expect(candidate?.entry.params).toEqual(['MotionEvent']);
    expect(candidate?.transformer).toBeNull();
  });
});
