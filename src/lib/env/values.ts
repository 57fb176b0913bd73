export type EnvSource = Readonly<Record<string, string | undefined>>;

const TRUE_VALUES = new Set(['1', 'true', 'yes', 'on']);
const FALSE_VALUES = new Set(['0', 'false', 'no', 'off']);

export type ReadNumberOptions = {
  readonly min?: number;
  readonly max?: number;
};

const processEnv = (): EnvSource => (typeof process !== 'undefined' ? process.env : {});

export const readStringEnv = (key: string, fallback?: string, env: EnvSource = processEnv()): string | undefined => {
  const raw = env[key];
  if (typeof raw !== 'string') return fallback;
  const trimmed = raw.trim();
  return trimmed.length > 0 ? trimmed : fallback;
};

export const readBooleanEnv = (key: string, fallback = false, env: EnvSource = processEnv()): boolean => {
  const raw = env[key];
  if (typeof raw === 'string') {
    const normalized = raw.trim().toLowerCase();
    if (TRUE_VALUES.has(normalized)) return true;
    if (FALSE_VALUES.has(normalized)) return false;
  }
  return fallback;
};

export const readNumberEnv = (
  key: string,
  fallback: number,
  options?: ReadNumberOptions,
  env: EnvSource = processEnv(),
): number => {
  const raw = env[key];
  let value: number | undefined;
  if (typeof raw === 'string') {
    const trimmed = raw.trim();
    if (trimmed.length > 0) {
      const parsed = Number(trimmed);
      if (Number.isFinite(parsed)) {
        value = parsed;
      }
    }
  }

  if (value === undefined) {
    return fallback;
  }

  if (options?.min !== undefined && value < options.min) {
    return fallback;
  }

  if (options?.max !== undefined && value > options.max) {
    return options.max;
  }

  return value;
};
