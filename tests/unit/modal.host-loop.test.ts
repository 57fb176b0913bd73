import { describe, it, expect } from 'vitest';
import { HostLoop } from '../../src/lib/modal/hostLoop';

const captureError = (fn: () => unknown): unknown => {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
};

describe('modal.host-loop', () => {
  it('drains tasks in post order, including ones posted while draining', () => {
    const host = new HostLoop();
    const log: string[] = [];
    host.post(() => {
      log.push('a');
      host.post(() => log.push('c'));
    });
    host.post(() => log.push('b'));

    expect(host.runPending()).toBe(3);
    expect(log).toEqual(['a', 'b', 'c']);
    expect(host.pending).toBe(0);
  });

  it('pumps a frame until it quits and leaves later tasks queued', () => {
    const host = new HostLoop();
    const frame = host.enterFrame();
    const log: string[] = [];
    host.post(() => log.push('first'));
    host.post(() => {
      log.push('quit');
      frame.quit();
    });
    host.post(() => log.push('later'));

    expect(host.pump(frame)).toBe(2);
    expect(log).toEqual(['first', 'quit']);
    expect(host.pending).toBe(1);
    expect(host.nestingDepth).toBe(0);
  });

  it('tracks nested frames', () => {
    const host = new HostLoop();
    const outer = host.enterFrame();
    const depths: number[] = [];
    host.post(() => {
      depths.push(host.nestingDepth);
      const inner = host.enterFrame();
      host.post(() => {
        depths.push(host.nestingDepth);
        inner.quit();
      });
      host.pump(inner);
      depths.push(host.nestingDepth);
      outer.quit();
    });

    host.pump(outer);
    expect(outer.depth).toBe(1);
    expect(depths).toEqual([1, 2, 1]);
    expect(host.nestingDepth).toBe(0);
  });

  it('lets an outer quit take effect after the inner frame unwinds', () => {
    const host = new HostLoop();
    const outer = host.enterFrame();
    const log: string[] = [];
    host.post(() => {
      const inner = host.enterFrame();
      host.post(() => {
        outer.quit();
        log.push('outer-quit');
      });
      host.post(() => {
        inner.quit();
        log.push('inner-quit');
      });
      host.post(() => log.push('never'));
      host.pump(inner);
      log.push('inner-done');
    });

    host.pump(outer);
    expect(log).toEqual(['outer-quit', 'inner-quit', 'inner-done']);
    expect(host.pending).toBe(1);
  });

  it('reports a stall instead of spinning on an empty queue', () => {
    const host = new HostLoop();
    const error = captureError(() => host.pump(host.enterFrame()));
    expect(error).toMatchObject({ code: 'E-SCREEN-0201', detail: 'depth=1' });
    expect(host.nestingDepth).toBe(0);
  });

  it('propagates task errors and unwinds the frame', () => {
    const host = new HostLoop();
    const failure = new Error('task failed');
    host.post(() => {
      throw failure;
    });

    expect(captureError(() => host.pump(host.enterFrame()))).toBe(failure);
    expect(host.nestingDepth).toBe(0);
  });

  it('cancels a queued task', () => {
    const host = new HostLoop();
    const log: string[] = [];
    const id = host.post(() => log.push('cancelled'));
    host.post(() => log.push('kept'));

    expect(host.cancel(id)).toBe(true);
    expect(host.cancel(id)).toBe(false);
    host.runPending();
    expect(log).toEqual(['kept']);
    expect(host.servicedCount).toBe(1);
  });
});
