// WHY: Single error type for the orchestration layer with stable E-SCREEN-xxxx codes.
// INVARIANT: Handler failures that are already Error instances are never re-wrapped.

export type Result<T, E = ScreenError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export class ScreenError extends Error {
  readonly code: ScreenErrorCodeT;
  readonly detail?: string;

  constructor(code: ScreenErrorCodeT, message: string, detail?: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'ScreenError';
    this.code = code;
    this.detail = detail;
  }

  toString(): string {
    const parts: string[] = [this.code, this.message];
    if (this.detail) parts.push(this.detail);
    return parts.join(': ');
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      detail: this.detail,
    };
  }
}

export const ScreenErrorCode = {
  // Dispatch (E-SCREEN-01xx)
  HandlerFailed: 'E-SCREEN-0101',
  TransformShape: 'E-SCREEN-0102',
  InvalidDeclaration: 'E-SCREEN-0103',

  // Modal bridge (E-SCREEN-02xx)
  ModalStalled: 'E-SCREEN-0201',
  ModalAlreadyStarted: 'E-SCREEN-0202',
  ModalDepthExceeded: 'E-SCREEN-0203',

  // Navigation (E-SCREEN-03xx)
  InvalidToken: 'E-SCREEN-0301',
  InvalidInstanceState: 'E-SCREEN-0302',

  Unknown: 'E-SCREEN-0999',
} as const;

export type ScreenErrorCodeT = typeof ScreenErrorCode[keyof typeof ScreenErrorCode];

export const isScreenError = (error: unknown): error is ScreenError => error instanceof ScreenError;

export const toScreenError = (error: unknown, fallbackCode: ScreenErrorCodeT = ScreenErrorCode.Unknown): ScreenError => {
  if (error instanceof ScreenError) {
    return error;
  }
  if (error instanceof Error) {
    return new ScreenError(fallbackCode, error.message, undefined, error);
  }
  return new ScreenError(fallbackCode, String(error));
};

const describeThrown = (thrown: unknown): string => {
  if (typeof thrown === 'string') return thrown;
  try {
    return JSON.stringify(thrown) ?? String(thrown);
  } catch {
    return String(thrown);
  }
};

// Error instances propagate exactly as thrown so stack attribution stays with the handler.
// Anything else (strings, plain objects) is wrapped once.
export const wrapHandlerFailure = (thrown: unknown, handlerName: string): Error => {
  if (thrown instanceof Error) {
    return thrown;
  }
  return new ScreenError(
    ScreenErrorCode.HandlerFailed,
    `Handler ${handlerName} threw a non-Error value`,
    describeThrown(thrown),
    thrown,
  );
};
