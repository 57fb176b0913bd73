// Runtime type tags used for exact signature matching.
// WHY: Handler lookup is keyed by (name, paramTypes); tags replace per-call introspection.
// INVARIANT: No widening. A subclass carrying its own tag never matches its parent's tag.

export const ARG_TYPE: unique symbol = Symbol.for('screenflow.argType');

export type ArgType = string;

export type TaggedValue = { readonly [ARG_TYPE]: ArgType };

const hasTag = (value: object): value is TaggedValue => {
  const tag: unknown = Reflect.get(value, ARG_TYPE);
  return typeof tag === 'string' && tag.length > 0;
};

export const argTypeOf = (value: unknown): ArgType => {
  if (typeof value !== 'object') return typeof value;
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  if (hasTag(value)) return value[ARG_TYPE];
  const proto: unknown = Object.getPrototypeOf(value);
  if (proto === null || proto === Object.prototype) return 'object';
  const ctor: unknown = Reflect.get(value, 'constructor');
  if (typeof ctor === 'function' && ctor.name) return ctor.name;
  return 'object';
};

export const argTypesOf = (args: readonly unknown[]): ArgType[] => args.map(argTypeOf);

export const sameSignature = (a: readonly ArgType[], b: readonly ArgType[]): boolean => {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i += 1) {
    if (a[i] !== b[i]) return false;
  }
  return true;
};

export const formatSignature = (name: string, params: readonly ArgType[]): string => `${name}(${params.join(',')})`;
