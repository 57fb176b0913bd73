import type { ArgType } from './argTypes';
import { lookupHandler, type HandlerEntry } from './handlers';
import type { ArgumentTransformer } from './transformer';

export type Candidate = {
  /** null means identity: the raw arguments are passed through unchanged. */
  readonly transformer: ArgumentTransformer | null;
  readonly entry: HandlerEntry;
};

// A declared entry only counts while the receiver still has a callable member behind it.
const viable = (entry: HandlerEntry | undefined, receiver: object): entry is HandlerEntry =>
  entry !== undefined && entry.bind(receiver) !== null;

// Identity first, then transformers in registration order. First match wins;
// signature specificity is deliberately not considered.
export const resolveCandidates = (
  name: string,
  receiver: object,
  argTypes: readonly ArgType[],
  transformers: readonly ArgumentTransformer[],
): Candidate[] => {
  const candidates: Candidate[] = [];

  const identity = lookupHandler(receiver, name, argTypes);
  if (viable(identity, receiver)) {
    candidates.push({ transformer: null, entry: identity });
  }

  for (const transformer of transformers) {
    if (!transformer.accepts(argTypes)) continue;
    const entry = lookupHandler(receiver, name, transformer.targetTypes);
    if (viable(entry, receiver)) {
      candidates.push({ transformer, entry });
    }
  }

  return candidates;
};

export const resolveHandler = (
  name: string,
  receiver: object,
  argTypes: readonly ArgType[],
  transformers: readonly ArgumentTransformer[],
): Candidate | null => resolveCandidates(name, receiver, argTypes, transformers)[0] ?? null;
