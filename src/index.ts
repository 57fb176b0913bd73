export { cfg, readConfig, type ScreenflowConfig } from './lib/config';
export { readBooleanEnv, readNumberEnv, readStringEnv, type EnvSource } from './lib/env/values';
export {
  ScreenError,
  ScreenErrorCode,
  isScreenError,
  toScreenError,
  wrapHandlerFailure,
  type Result,
  type ScreenErrorCodeT,
} from './lib/errors';
export { emitTelemetryEvent, type TelemetryEventName, type TraceEvent } from './lib/telemetry';
export { screenRuntime, selectModalDepth, selectTraceEvents, type ScreenRuntimeState } from './state/runtime';

export { ARG_TYPE, argTypeOf, argTypesOf, sameSignature, type ArgType, type TaggedValue } from './lib/dispatch/argTypes';
export {
  HandlerTable,
  handlerSignaturesOf,
  hasHandler,
  lookupHandler,
  registerHandler,
  type HandlerDeclarations,
  type HandlerEntry,
} from './lib/dispatch/handlers';
export { ArgumentTransformer, type TransformFn } from './lib/dispatch/transformer';
export { resolveCandidates, resolveHandler, type Candidate } from './lib/dispatch/resolver';
export { EventDispatcher, NOT_CALLED, dispatch, invokeIfSupported, type DispatchOutcome } from './lib/dispatch/dispatcher';
export {
  MotionEvent,
  MotionEventDispatcher,
  createXYTransformer,
  dispatchMotion,
  motionHandlerName,
  type MotionAction,
} from './lib/dispatch/motion';
export {
  CommandRouter,
  IdRegistry,
  MenuItem,
  commandHandlerName,
  resolveCommandRoute,
  type CommandRoute,
} from './lib/dispatch/commands';

export { HostLoop, LoopFrame } from './lib/modal/hostLoop';
export { ModalTask, presentModal, valueOr, type ModalOutcome, type ModalState, type ModalTrigger } from './lib/modal/modalTask';
export { presentPrompt, type PromptHandle, type PromptPresenter, type PromptRequest, type PromptView } from './lib/modal/prompt';

export { compareTokens, createTokenMinter, isToken, parseToken, type ParsedToken } from './lib/navigation/tokens';
export {
  CorrelationStore,
  EXTRA_ARGUMENTS_TOKEN,
  EXTRA_RESULT_TOKEN,
  EXTRA_TARGET,
  NavigationExtrasSchema,
  correlator,
  readToken,
  type NavigationExtras,
  type PendingHandler,
} from './lib/navigation/correlator';

export {
  REQUEST_PRESENT_ACTIVITY,
  REQUEST_PRESENT_SCREEN,
  ScreenController,
  type ActivityResult,
  type ActivityStarter,
  type LifecycleInjection,
  type NavigationRequest,
  type NavigationResponse,
  type Navigator,
  type ResultCode,
  type ScreenControllerOptions,
} from './lib/screen/controller';
