import { ScreenError, ScreenErrorCode } from '../errors';
import { formatSignature, sameSignature, type ArgType } from './argTypes';
import { hasHandler } from './handlers';

export type TransformFn = (args: readonly unknown[]) => unknown[];

/**
 * Pure adapter from one argument shape to another.
 *
 * A transformer only inspects the receiver to decide support; it never dispatches.
 * INVARIANT: transform() output always has targetTypes.length entries.
 */
export class ArgumentTransformer {
  readonly sourceTypes: readonly ArgType[];
  readonly targetTypes: readonly ArgType[];
  readonly label: string;
  private readonly fn: TransformFn;

  constructor(sourceTypes: readonly ArgType[], targetTypes: readonly ArgType[], fn: TransformFn, label?: string) {
    this.sourceTypes = Object.freeze([...sourceTypes]);
    this.targetTypes = Object.freeze([...targetTypes]);
    this.fn = fn;
    this.label = label ?? `${formatSignature('', sourceTypes)}->${formatSignature('', targetTypes)}`;
  }

  accepts(argTypes: readonly ArgType[]): boolean {
    return sameSignature(argTypes, this.sourceTypes);
  }

  supports(receiver: object, name: string, argTypes: readonly ArgType[]): boolean {
    return this.accepts(argTypes) && hasHandler(receiver, name, this.targetTypes);
  }

  transform(args: readonly unknown[]): unknown[] {
    const out = this.fn(args);
    if (out.length !== this.targetTypes.length) {
      throw new ScreenError(
        ScreenErrorCode.TransformShape,
        `Transformer ${this.label} produced ${out.length} arguments, expected ${this.targetTypes.length}`,
      );
    }
    return out;
  }

  addIfSupportedBy(
    receiver: object,
    name: string,
    argTypes: readonly ArgType[],
    list: ArgumentTransformer[],
  ): ArgumentTransformer[] {
    if (this.supports(receiver, name, argTypes)) {
      list.push(this);
    }
    return list;
  }
}
