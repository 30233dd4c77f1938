/**
 * Runtime storage for one declared Value.
 */

import type { BuiltinKind, ParseFn, SetBehavior, ValueDecl, ValueKindMap } from "@argweave/sdk";
import {
  ArgError,
  ErrorCode,
  ParseError,
  SchemaError,
  ValidationError,
  ValueAccessError,
} from "@argweave/sdk";
import { createLogger } from "@argweave/shared";
import { BUILTIN_KINDS } from "./kinds.js";
import type { KindDefinition } from "./kinds.js";
import type { KindBinding } from "./registry.js";
import { SlotArena } from "./slot-arena.js";
import type { ValueVariant } from "./variant.js";

const logger = createLogger("Value");

/** Tree-wide settings a Value falls back to when its declaration is silent. */
export interface ValueDefaults {
  setBehavior: SetBehavior;
  argDelims: string;
  maxChildren: number;
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

export class TypedValue<T> implements ValueVariant {
  readonly kind: string;
  readonly typeName: string;
  readonly name: string;
  readonly description: string;
  readonly group?: string;
  readonly setBehavior: SetBehavior;
  readonly argDelims: string;
  readonly maxArgs: number;

  private readonly slots: SlotArena<T>;
  private readonly parseFn?: ParseFn<T>;
  private readonly validFn?: (value: T) => boolean;
  private readonly defaultValue?: T;
  private setFlag = false;
  private maxedFlag = false;

  constructor(
    decl: ValueDecl<T>,
    private readonly binding: KindBinding<T>,
    defaults: ValueDefaults,
  ) {
    const maxArgs = decl.maxArgs ?? 1;
    if (!Number.isInteger(maxArgs) || maxArgs < 1 || maxArgs > defaults.maxChildren) {
      throw new SchemaError(
        `Value '${decl.name}' declares maxArgs ${maxArgs}; it must be between 1 and ${defaults.maxChildren}`,
        { code: ErrorCode.CAPACITY_EXCEEDED, argument: decl.name },
      );
    }

    this.kind = binding.kind;
    this.typeName = decl.typeAlias ?? binding.typeName;
    this.name = decl.name;
    this.description = decl.description ?? "";
    this.group = decl.group;
    this.setBehavior = decl.setBehavior ?? defaults.setBehavior;
    this.argDelims = decl.argDelims ?? defaults.argDelims;
    this.maxArgs = maxArgs;
    this.slots = new SlotArena<T>(defaults.maxChildren);
    this.parseFn = decl.parseFn;
    this.validFn = decl.validFn;
    this.defaultValue = decl.defaultValue;
  }

  get argIdx(): number {
    return this.slots.length;
  }

  get isSet(): boolean {
    return this.setFlag;
  }

  get isMaxed(): boolean {
    return this.maxedFlag;
  }

  get hasDefault(): boolean {
    return this.defaultValue !== undefined;
  }

  get hasCustomParseFn(): boolean {
    return this.parseFn !== undefined;
  }

  get hasCustomValidFn(): boolean {
    return this.validFn !== undefined;
  }

  /**
   * Coerce a token: the Value's own parseFn first, then the kind's
   * type-level parser, then the kind's native coercion.
   */
  parse(token: string): T {
    if (this.parseFn) return this.parseWithOverride(token, this.parseFn, "parse function");
    if (this.binding.typeParser) return this.parseWithOverride(token, this.binding.typeParser, "type-level parser");

    try {
      return this.binding.coerce(token);
    } catch (err) {
      if (err instanceof ArgError) {
        throw new ParseError(err.message, {
          code: err.code,
          token,
          argument: this.name,
          cause: err,
        });
      }
      throw new ParseError(`Cannot parse "${token}" for '${this.name}'`, {
        token,
        argument: this.name,
        cause: toError(err),
      });
    }
  }

  /**
   * Parse, validate and store a token according to the set behavior.
   * Multi Values split a token on the first of their delimiters it contains.
   */
  set(token: string): void {
    if (this.setBehavior === "multi" && this.binding.splittable) {
      const delim = [...this.argDelims].find((d) => token.includes(d));
      if (delim !== undefined) {
        for (const piece of token.split(delim)) this.set(piece);
        return;
      }
    }

    const parsed = this.parse(token);
    if (this.validFn && !this.validFn(parsed)) {
      throw new ValidationError(`"${token}" is not a valid value for '${this.name}'`, {
        token,
        argument: this.name,
      });
    }

    switch (this.setBehavior) {
      case "first":
        if (!this.slots.at(0)) this.slots.put(0, parsed);
        break;
      case "last":
        this.slots.put(0, parsed);
        break;
      case "multi":
        if (this.slots.length < this.maxArgs) {
          this.slots.put(this.slots.length, parsed);
        } else {
          logger.debug("Value is maxed, argument dropped", { value: this.name, token });
        }
        break;
    }
    this.setFlag = true;
    this.maxedFlag = this.slots.length === this.maxArgs;
  }

  /**
   * The first stored argument, else the default.
   *
   * @throws ValueAccessError(VALUE_NOT_SET)
   */
  get(): T {
    const first = this.slots.at(0);
    if (first) return first.item;
    const fallback = this.fallback();
    if (fallback) return fallback.item;
    throw this.notSet();
  }

  /**
   * Every stored argument, else the declared default as a single element.
   * Unlike `get()`, an unset bool has no implicit fallback here.
   *
   * @throws ValueAccessError(VALUE_NOT_SET)
   */
  getAll(): T[] {
    if (this.slots.length > 0) return this.slots.toArray();
    if (this.defaultValue !== undefined) return [this.defaultValue];
    throw this.notSet();
  }

  /**
   * `get()` checked against a built-in kind.
   *
   * @throws ValueAccessError(REQUESTED_TYPE_MISMATCH)
   */
  getAs<K extends BuiltinKind>(kind: K): ValueKindMap[K] {
    if (this.kind !== kind) throw this.mismatch(kind);
    const value = this.get();
    const definition: KindDefinition<ValueKindMap[K]> = BUILTIN_KINDS[kind];
    if (!definition.is(value)) throw this.mismatch(kind);
    return value;
  }

  private fallback(): { item: T } | undefined {
    if (this.defaultValue !== undefined) return { item: this.defaultValue };
    if (this.binding.implicitDefault !== undefined) return { item: this.binding.implicitDefault };
    return undefined;
  }

  private parseWithOverride(token: string, parse: ParseFn<T>, source: string): T {
    try {
      return parse(token);
    } catch (err) {
      throw new ParseError(`Cannot parse "${token}" for '${this.name}' with its ${source}`, {
        code: ErrorCode.CANNOT_PARSE_ARG_TO_VALUE,
        token,
        argument: this.name,
        cause: toError(err),
      });
    }
  }

  private notSet(): ValueAccessError {
    return new ValueAccessError(`Value '${this.name}' is not set and has no default`, ErrorCode.VALUE_NOT_SET, {
      argument: this.name,
    });
  }

  private mismatch(requested: string): ValueAccessError {
    return new ValueAccessError(
      `Value '${this.name}' is of kind ${this.kind}, not ${requested}`,
      ErrorCode.REQUESTED_TYPE_MISMATCH,
      { argument: this.name },
    );
  }
}
