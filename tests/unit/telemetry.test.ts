import { describe, it, expect, vi } from 'vitest';
import { cfg } from '../../src/lib/config';
import { emitTelemetryEvent } from '../../src/lib/telemetry';
import { screenRuntime, selectTraceEvents } from '../../src/state/runtime';

describe('telemetry', () => {
  it('fills span, kind and status from the event defaults', () => {
    const event = emitTelemetryEvent('modal.dismiss', { traceId: ' modal-1 ', durationMs: 12 });
    expect(event).toMatchObject({
      traceId: 'modal-1',
      name: 'modal.dismiss',
      span: 'modal',
      kind: 'span_finish',
      status: 'dismissed',
      durationMs: 12,
    });
    expect(selectTraceEvents(screenRuntime.getState(), 'modal-1')).toEqual([event]);
  });

  it('requires a trace id', () => {
    expect(() => emitTelemetryEvent('dispatch.miss', { traceId: '  ' })).toThrowError(
      'telemetry event dispatch.miss missing traceId',
    );
  });

  it('flattens data into scalars and short lists', () => {
    const event = emitTelemetryEvent('dispatch.invoke', {
      traceId: 'screen-1',
      data: {
        dropped: undefined,
        empty: null,
        event: 'command',
        ids: [1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12],
        arity: 10n,
        flags: [true, undefined],
      },
    });
    expect(event.data).toEqual({
      empty: null,
      event: 'command',
      ids: [1, 2, 3, 4, 5, 6, 7, 8, 9, 10],
      arity: '10',
      flags: [true, 'undefined'],
    });
  });

  it('keeps only the configured number of events', () => {
    cfg.traceBufferSize = 2;
    emitTelemetryEvent('navigation.start', { traceId: 't1' });
    emitTelemetryEvent('navigation.start', { traceId: 't2' });
    emitTelemetryEvent('navigation.start', { traceId: 't3' });

    expect(screenRuntime.getState().traceEvents.map((event) => event.traceId)).toEqual(['t2', 't3']);
  });

  it('echoes events to the console when enabled', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => undefined);
    emitTelemetryEvent('navigation.finish', { traceId: 'quiet' });
    expect(info).not.toHaveBeenCalled();

    cfg.telemetryEcho = true;
    emitTelemetryEvent('navigation.finish', { traceId: 'loud' });
    expect(info).toHaveBeenCalledWith(
      '[telemetry] navigation.finish',
      expect.objectContaining({ traceId: 'loud', kind: 'instant', status: 'ok' }),
    );
  });
});
