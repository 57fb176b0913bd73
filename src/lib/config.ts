import { readBooleanEnv, readNumberEnv, type EnvSource } from './env/values';

export type ScreenflowConfig = {
  // Trace events retained by the runtime store (ring buffer).
  traceBufferSize: number;
  // Mirror every telemetry event to console.info.
  telemetryEcho: boolean;
  // 0 disables the nesting cap.
  maxModalDepth: number;
};

export const readConfig = (env?: EnvSource): ScreenflowConfig => ({
  traceBufferSize: readNumberEnv('SCREENFLOW_TRACE_BUFFER', 200, { min: 1, max: 10_000 }, env),
  telemetryEcho: readBooleanEnv('SCREENFLOW_TELEMETRY_ECHO', false, env),
  maxModalDepth: readNumberEnv('SCREENFLOW_MAX_MODAL_DEPTH', 0, { min: 0 }, env),
});

export const cfg: ScreenflowConfig = readConfig();
