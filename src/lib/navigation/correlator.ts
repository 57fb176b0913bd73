/**
 * Navigation/Result Correlator
 *
 * WHY: Navigation payloads only carry opaque data, so arguments, results and pending result
 * handlers are parked here under a token and picked up on the other side.
 * INVARIANT: Results and pending handlers are taken at most once; the entry is removed before
 * the value is handed out.
 * INVARIANT: Arguments are read-many. They survive until no holder remains and reclaim() runs,
 * or until the generation that issued them is retired.
 * INVARIANT: A miss (unknown, malformed, reclaimed or stale token) is an absent value, never an error.
 *
 * Every method does its lookup and mutation in one synchronous step, which is the whole
 * critical section on a single-threaded host.
 */

import { z } from 'zod';
import { createTokenMinter, isToken, parseToken, type TokenMinter } from './tokens';

export type PendingHandler = (payload: unknown) => void;

type ArgumentsEntry = {
  args: readonly unknown[];
  holders: number;
  generation: number;
};

export type CorrelationStoreOptions = {
  now?: () => number;
};

export type CorrelationStoreSize = {
  arguments: number;
  results: number;
  pendingHandlers: number;
};

export class CorrelationStore {
  private readonly argumentEntries = new Map<string, ArgumentsEntry>();
  private readonly results = new Map<string, unknown>();
  private readonly pendingHandlers = new Map<string, PendingHandler>();
  private readonly minter: TokenMinter;
  private generation = 0;

  constructor(options: CorrelationStoreOptions = {}) {
    this.minter = createTokenMinter(options.now);
  }

  get currentGeneration(): number {
    return this.generation;
  }

  registerArguments(args: readonly unknown[]): string {
    const token = this.minter.mint(this.generation);
    this.argumentEntries.set(token, { args: [...args], holders: 1, generation: this.generation });
    return token;
  }

  retainArguments(token: string): boolean {
    const entry = this.argumentEntries.get(token);
    if (!entry) return false;
    entry.holders += 1;
    return true;
  }

  releaseArguments(token: string): boolean {
    const entry = this.argumentEntries.get(token);
    if (!entry) return false;
    if (entry.holders === 0) {
      console.warn(`[correlator] arguments ${token} released with no holders left`);
      return false;
    }
    entry.holders -= 1;
    return true;
  }

  /** Drops argument entries nobody holds any more. Returns how many were dropped. */
  reclaim(): number {
    let dropped = 0;
    for (const [token, entry] of this.argumentEntries) {
      if (entry.holders > 0) continue;
      this.argumentEntries.delete(token);
      dropped += 1;
    }
    return dropped;
  }

  /**
   * Retires every argument token issued so far, the way a process restart would.
   * Results and pending handlers are left alone.
   */
  advanceGeneration(): number {
    const retired = this.generation;
    this.generation += 1;
    for (const [token, entry] of this.argumentEntries) {
      if (entry.generation <= retired) this.argumentEntries.delete(token);
    }
    return this.generation;
  }

  takeArguments(token: unknown): readonly unknown[] | undefined {
    if (typeof token !== 'string') return undefined;
    const parsed = parseToken(token);
    if (!parsed || parsed.generation !== this.generation) return undefined;
    return this.argumentEntries.get(token)?.args;
  }

  registerResult(value: unknown): string {
    const token = this.minter.mint(this.generation);
    this.results.set(token, value);
    return token;
  }

  hasResult(token: unknown): boolean {
    return isToken(token) && this.results.has(token);
  }

  takeResult(token: unknown): unknown {
    if (!isToken(token) || !this.results.has(token)) return undefined;
    const value = this.results.get(token);
    this.results.delete(token);
    return value;
  }

  registerPendingHandler(handler: PendingHandler): string {
    const token = this.minter.mint(this.generation);
    this.pendingHandlers.set(token, handler);
    return token;
  }

  hasPendingHandler(token: unknown): boolean {
    return isToken(token) && this.pendingHandlers.has(token);
  }

  /** Removes the handler, then runs it with the payload. Handler errors propagate. */
  takeAndDispatch(token: unknown, payload: unknown): boolean {
    if (!isToken(token)) return false;
    const handler = this.pendingHandlers.get(token);
    if (!handler) return false;
    this.pendingHandlers.delete(token);
    handler(payload);
    return true;
  }

  size(): CorrelationStoreSize {
    return {
      arguments: this.argumentEntries.size,
      results: this.results.size,
      pendingHandlers: this.pendingHandlers.size,
    };
  }

  clear(): void {
    this.argumentEntries.clear();
    this.results.clear();
    this.pendingHandlers.clear();
  }
}

export const correlator = new CorrelationStore();

export const EXTRA_ARGUMENTS_TOKEN = 'screenflow.argumentsToken';
export const EXTRA_RESULT_TOKEN = 'screenflow.resultToken';
export const EXTRA_TARGET = 'screenflow.target';

export const NavigationExtrasSchema = z.record(z.string(), z.unknown());

export type NavigationExtras = z.infer<typeof NavigationExtrasSchema>;

export const readToken = (extras: unknown, key: string): string | null => {
  const parsed = NavigationExtrasSchema.safeParse(extras);
  if (!parsed.success) return null;
  const value = parsed.data[key];
  return isToken(value) ? value : null;
};
