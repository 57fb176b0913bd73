/**
 * Handler capability tables.
 *
 * WHY: Screens declare which methods answer which event shapes once, as static metadata,
 * instead of having every dispatch introspect the receiver.
 * INVARIANT: Lookup is exact on (name, paramTypes); the first matching registration wins.
 *
 * Two sources feed a receiver's surface:
 * - `static handlers` on the receiver's class and its ancestors (merged parent-first, so a
 *   subclass may add signatures; methods are always looked up on the receiver at call time)
 * - `registerHandler(receiver, ...)` for instance-level handlers, consulted before the class table
 */

import { z } from 'zod';
import { ScreenError, ScreenErrorCode } from '../errors';
import { formatSignature, type ArgType } from './argTypes';

export type HandlerDeclarations = Readonly<Record<string, ReadonlyArray<ReadonlyArray<ArgType>>>>;

export type HandlerCall = (args: readonly unknown[]) => unknown;

export type HandlerEntry = {
  readonly name: string;
  readonly params: readonly ArgType[];
  readonly source: 'class' | 'instance';
  /** Binds the entry to a receiver; null when the receiver no longer exposes the method. */
  readonly bind: (receiver: object) => HandlerCall | null;
};

// Leading underscore marks a method as non-public; those are never dispatch targets.
const HandlerNameSchema = z.string().regex(/^[A-Za-z$][\w$]*$/, 'handler names must be public identifiers');
const HandlerDeclarationsSchema = z.record(HandlerNameSchema, z.array(z.array(z.string().min(1))));

const keyOf = (name: string, params: readonly ArgType[]): string => formatSignature(name, params);

export class HandlerTable {
  private readonly entries = new Map<string, HandlerEntry>();

  add(entry: HandlerEntry): void {
    const key = keyOf(entry.name, entry.params);
    // Keep original insertion order when a subclass redeclares a signature.
    this.entries.set(key, entry);
  }

  remove(name: string, params: readonly ArgType[]): boolean {
    return this.entries.delete(keyOf(name, params));
  }

  lookup(name: string, params: readonly ArgType[]): HandlerEntry | undefined {
    return this.entries.get(keyOf(name, params));
  }

  has(name: string, params: readonly ArgType[]): boolean {
    return this.entries.has(keyOf(name, params));
  }

  signaturesFor(name: string): ArgType[][] {
    const out: ArgType[][] = [];
    for (const entry of this.entries.values()) {
      if (entry.name === name) out.push([...entry.params]);
    }
    return out;
  }

  get size(): number {
    return this.entries.size;
  }
}

const classTables = new WeakMap<object, HandlerTable>();
const instanceTables = new WeakMap<object, HandlerTable>();

const bindByName = (name: string) => (receiver: object): HandlerCall | null => {
  const fn: unknown = Reflect.get(receiver, name);
  if (typeof fn !== 'function') return null;
  return (args) => Reflect.apply(fn, receiver, args);
};

// Base class first so derived declarations extend (or re-register) inherited ones.
const constructorChain = (ctor: object): object[] => {
  const chain: object[] = [];
  let current: unknown = ctor;
  while (typeof current === 'function' && current !== Function.prototype) {
    chain.push(current);
    current = Object.getPrototypeOf(current);
  }
  return chain.reverse();
};

const readDeclarations = (owner: object): HandlerDeclarations | null => {
  if (!Object.prototype.hasOwnProperty.call(owner, 'handlers')) return null;
  const parsed = HandlerDeclarationsSchema.safeParse(Reflect.get(owner, 'handlers'));
  if (!parsed.success) {
    const ownerName: unknown = Reflect.get(owner, 'name');
    throw new ScreenError(
      ScreenErrorCode.InvalidDeclaration,
      `Invalid handler declarations on ${typeof ownerName === 'string' ? ownerName : 'anonymous class'}`,
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; '),
    );
  }
  return parsed.data;
};

export const buildClassTable = (ctor: object): HandlerTable => {
  const table = new HandlerTable();
  const prototype: unknown = Reflect.get(ctor, 'prototype');
  for (const owner of constructorChain(ctor)) {
    const declarations = readDeclarations(owner);
    if (!declarations) continue;
    for (const [name, signatures] of Object.entries(declarations)) {
      const method: unknown = typeof prototype === 'object' && prototype !== null ? Reflect.get(prototype, name) : undefined;
      if (typeof method !== 'function') {
        throw new ScreenError(
          ScreenErrorCode.InvalidDeclaration,
          `Declared handler ${name} is not a method`,
          formatSignature(name, signatures[0] ?? []),
        );
      }
      for (const params of signatures) {
        table.add({ name, params: [...params], source: 'class', bind: bindByName(name) });
      }
    }
  }
  return table;
};

export const classTableOf = (receiver: object): HandlerTable | null => {
  const ctor: unknown = Reflect.get(receiver, 'constructor');
  if (typeof ctor !== 'function') return null;
  let table = classTables.get(ctor);
  if (!table) {
    table = buildClassTable(ctor);
    classTables.set(ctor, table);
  }
  return table;
};

export const registerHandler = <R extends object>(
  receiver: R,
  name: string,
  params: readonly ArgType[],
  fn: (this: R, ...args: never[]) => unknown,
): (() => void) => {
  const parsedName = HandlerNameSchema.safeParse(name);
  if (!parsedName.success) {
    throw new ScreenError(ScreenErrorCode.InvalidDeclaration, `Invalid handler name: ${name}`);
  }
  let table = instanceTables.get(receiver);
  if (!table) {
    table = new HandlerTable();
    instanceTables.set(receiver, table);
  }
  const entry: HandlerEntry = {
    name,
    params: [...params],
    source: 'instance',
    bind: (target) => (args) => Reflect.apply(fn, target, args),
  };
  table.add(entry);
  return () => {
    const current = instanceTables.get(receiver);
    if (current?.lookup(name, params) === entry) {
      current.remove(name, params);
    }
  };
};

export const lookupHandler = (receiver: object, name: string, params: readonly ArgType[]): HandlerEntry | undefined =>
  instanceTables.get(receiver)?.lookup(name, params) ?? classTableOf(receiver)?.lookup(name, params);

export const hasHandler = (receiver: object, name: string, params: readonly ArgType[]): boolean =>
  lookupHandler(receiver, name, params) !== undefined;

export const handlerSignaturesOf = (receiver: object, name: string): ArgType[][] => {
  const seen = new Set<string>();
  const out: ArgType[][] = [];
  const tables = [instanceTables.get(receiver), classTableOf(receiver)];
  for (const table of tables) {
    if (!table) continue;
    for (const params of table.signaturesFor(name)) {
      const key = keyOf(name, params);
      if (seen.has(key)) continue;
      seen.add(key);
      out.push(params);
    }
  }
  return out;
};
