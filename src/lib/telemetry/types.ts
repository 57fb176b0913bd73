export type TelemetryEventName =
  | 'modal.open'
  | 'modal.complete'
  | 'modal.dismiss'
  | 'modal.duplicate_completion'
  | 'modal.abort'
  | 'dispatch.invoke'
  | 'dispatch.miss'
  | 'navigation.start'
  | 'navigation.result'
  | 'navigation.result_miss'
  | 'navigation.finish';

export type TraceSpan = 'modal' | 'dispatch' | 'navigation';

export type TraceEventStatus = 'ok' | 'error' | 'dismissed' | 'skipped';

export type TraceEventKind = 'span_start' | 'span_finish' | 'instant';

export type TraceEvent = {
  id: string;
  traceId: string;
  name: TelemetryEventName;
  timestamp: number;
  kind: TraceEventKind;
  span?: TraceSpan;
  durationMs?: number;
  status?: TraceEventStatus;
  data?: Record<string, unknown>;
};

export type TelemetryEventPayload = {
  traceId: string;
  timestamp?: number;
  span?: TraceSpan;
  durationMs?: number;
  status?: TraceEventStatus;
  data?: Record<string, unknown>;
  kind?: TraceEventKind;
};
