import { createStore } from 'zustand/vanilla';
import { cfg } from '../lib/config';
import type { TraceEvent } from '../lib/telemetry/types';

// Runtime state shared by the modal bridge, the dispatcher and navigation so diagnostics
// can observe how deep the host loop is nested and what happened recently.
export type ModalStackEntry = {
  id: string;
  label: string;
  openedAt: number;
  depth: number;
};

export type ScreenRuntimeState = {
  modalStack: ModalStackEntry[];
  traceEvents: TraceEvent[];
  pushModal: (entry: ModalStackEntry) => void;
  popModal: (id: string) => void;
  recordTraceEvent: (event: TraceEvent) => void;
  clearTraceEvents: () => void;
  reset: () => void;
};

export const screenRuntime = createStore<ScreenRuntimeState>()((set) => ({
  modalStack: [],
  traceEvents: [],
  pushModal: (entry) => set((state) => ({ modalStack: [...state.modalStack, entry] })),
  // Modals finish innermost-first, but an aborted outer wait may unwind past inner entries.
  popModal: (id) =>
    set((state) => {
      const index = state.modalStack.findIndex((entry) => entry.id === id);
      if (index < 0) return state;
      return { modalStack: state.modalStack.slice(0, index) };
    }),
  recordTraceEvent: (event) =>
    set((state) => {
      const next = state.traceEvents.concat(event);
      const overflow = next.length - cfg.traceBufferSize;
      return { traceEvents: overflow > 0 ? next.slice(overflow) : next };
    }),
  clearTraceEvents: () => set({ traceEvents: [] }),
  reset: () => set({ modalStack: [], traceEvents: [] }),
}));

export const selectModalDepth = (state: ScreenRuntimeState): number => state.modalStack.length;

export const selectTraceEvents = (state: ScreenRuntimeState, traceId: string): TraceEvent[] =>
  state.traceEvents.filter((event) => event.traceId === traceId);
