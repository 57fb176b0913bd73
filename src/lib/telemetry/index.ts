import { screenRuntime } from '../../state/runtime';
import { cfg } from '../config';
import { ScreenError, ScreenErrorCode } from '../errors';
import { createId } from '../utils';
import type {
  TelemetryEventName,
  TelemetryEventPayload,
  TraceEvent,
  TraceEventKind,
  TraceEventStatus,
  TraceSpan,
} from './types';

type EventDefaults = Partial<{
  span: TraceSpan;
  kind: TraceEventKind;
  status: TraceEventStatus;
}>;

const EVENT_DEFAULTS: Record<TelemetryEventName, EventDefaults> = {
  'modal.open': { span: 'modal', kind: 'span_start' },
  'modal.complete': { span: 'modal', kind: 'span_finish', status: 'ok' },
  'modal.dismiss': { span: 'modal', kind: 'span_finish', status: 'dismissed' },
  'modal.duplicate_completion': { span: 'modal', kind: 'instant', status: 'skipped' },
  'modal.abort': { span: 'modal', kind: 'span_finish', status: 'error' },
  'dispatch.invoke': { span: 'dispatch', kind: 'instant', status: 'ok' },
  'dispatch.miss': { span: 'dispatch', kind: 'instant', status: 'skipped' },
  'navigation.start': { span: 'navigation', kind: 'span_start' },
  'navigation.result': { span: 'navigation', kind: 'span_finish', status: 'ok' },
  'navigation.result_miss': { span: 'navigation', kind: 'span_finish', status: 'dismissed' },
  'navigation.finish': { span: 'navigation', kind: 'instant', status: 'ok' },
};

type TraceValue = string | number | boolean | null;

const toTraceValue = (value: unknown): TraceValue =>
  value === null || typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean'
    ? value
    : String(value);

// Event data is flat: scalars, plus lists cut to their first 10 items.
const sanitizeData = (input: Record<string, unknown> | undefined): Record<string, unknown> | undefined => {
  if (!input) return undefined;
  const out: Record<string, TraceValue | TraceValue[]> = {};
  for (const [key, value] of Object.entries(input)) {
    if (value === undefined) continue;
    out[key] = Array.isArray(value) ? value.slice(0, 10).map(toTraceValue) : toTraceValue(value);
  }
  return out;
};

export const emitTelemetryEvent = (name: TelemetryEventName, payload: TelemetryEventPayload): TraceEvent => {
  const traceId = payload.traceId.trim();
  if (!traceId) {
    throw new ScreenError(ScreenErrorCode.Unknown, `telemetry event ${name} missing traceId`);
  }

  const defaults = EVENT_DEFAULTS[name];
  const event: TraceEvent = {
    id: createId('traceevt'),
    name,
    traceId,
    timestamp: payload.timestamp ?? Date.now(),
    kind: payload.kind ?? defaults.kind ?? 'instant',
    span: payload.span ?? defaults.span,
    status: payload.status ?? defaults.status,
    durationMs: payload.durationMs,
    data: sanitizeData(payload.data),
  };

  screenRuntime.getState().recordTraceEvent(event);

  if (cfg.telemetryEcho) {
    console.info(`[telemetry] ${name}`, {
      traceId,
      span: event.span,
      kind: event.kind,
      status: event.status,
      durationMs: event.durationMs,
      data: event.data,
    });
  }

  return event;
};

export type { TelemetryEventName, TelemetryEventPayload, TraceEvent } from './types';
