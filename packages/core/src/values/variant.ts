import type { BuiltinKind, SetBehavior, ValueKindMap } from "@argweave/sdk";

/**
 * Kind-erased view of a single Value.
 *
 * Commands and Options hold Values through this interface so that a tree
 * can mix element types freely. `getAs()` recovers a typed element for the
 * built-in kinds.
 */
export interface ValueVariant {
  readonly kind: string;
  /** Display name of the element type (the declared alias if any). */
  readonly typeName: string;
  readonly name: string;
  readonly description: string;
  readonly group?: string;
  readonly setBehavior: SetBehavior;
  readonly argDelims: string;
  readonly maxArgs: number;
  readonly argIdx: number;
  readonly isSet: boolean;
  readonly isMaxed: boolean;
  readonly hasDefault: boolean;
  readonly hasCustomParseFn: boolean;
  readonly hasCustomValidFn: boolean;

  parse(token: string): unknown;
  set(token: string): void;
  get(): unknown;
  getAll(): unknown[];
  getAs<K extends BuiltinKind>(kind: K): ValueKindMap[K];
}
