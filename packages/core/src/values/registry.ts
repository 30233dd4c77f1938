/**
 * Registry of value kinds.
 *
 * Built-in kinds are always present. Projects can add their own kinds and
 * install a type-level parser that every Value of a kind uses unless the
 * Value declares its own `parseFn`.
 */

import type { BuiltinKind, ParseFn, ValueKindMap } from "@argweave/sdk";
import { ErrorCode, ParseError, SchemaError } from "@argweave/sdk";
import { createLogger } from "@argweave/shared";
import { BUILTIN_KINDS, isBuiltinKind } from "./kinds.js";
import type { KindDefinition } from "./kinds.js";

const logger = createLogger("ValueKindRegistry");

/** Everything a Value needs to know about its kind. */
export interface KindBinding<T> {
  readonly kind: string;
  readonly typeName: string;
  /** Coercion native to the kind. */
  readonly coerce: ParseFn<T>;
  /** Type-level override installed with `setTypeParser()`. */
  readonly typeParser?: ParseFn<T>;
  readonly implicitDefault?: T;
  readonly splittable: boolean;
}

export interface CustomKindDefinition<T> {
  /** Shown in usage/help. Defaults to the kind name. */
  typeName?: string;
  parse: ParseFn<T>;
  /** Whether multi Values of this kind split tokens on delimiters. Defaults to true. */
  splittable?: boolean;
}

export class ValueKindRegistry {
  private readonly custom = new Map<string, KindBinding<unknown>>();
  private readonly typeParsers = new Map<string, ParseFn<unknown>>();

  /**
   * Register a custom kind.
   *
   * @throws SchemaError if the name is empty, built in, or already registered
   */
  register<T>(kind: string, definition: CustomKindDefinition<T>): void {
    if (kind.trim() === "") {
      throw new SchemaError("Value kind name must be a non-empty string");
    }
    if (isBuiltinKind(kind)) {
      throw new SchemaError(`Value kind "${kind}" is built in and cannot be registered`, {
        code: ErrorCode.DUPLICATE_NAME,
        argument: kind,
      });
    }
    if (this.custom.has(kind)) {
      throw new SchemaError(`Value kind "${kind}" is already registered`, {
        code: ErrorCode.DUPLICATE_NAME,
        argument: kind,
      });
    }
    logger.debug(`Registering value kind: ${kind}`);
    this.custom.set(kind, {
      kind,
      typeName: definition.typeName ?? kind,
      coerce: definition.parse,
      splittable: definition.splittable ?? true,
    });
  }

  /** Override parsing for every Value of `kind` that has no parseFn of its own. */
  setTypeParser<K extends BuiltinKind>(kind: K, parse: ParseFn<ValueKindMap[K]>): void;
  setTypeParser(kind: string, parse: ParseFn<unknown>): void;
  setTypeParser(kind: string, parse: ParseFn<unknown>): void {
    if (!this.has(kind)) throw unknownKind(kind);
    this.typeParsers.set(kind, parse);
    logger.debug(`Type-level parser installed for kind: ${kind}`);
  }

  has(kind: string): boolean {
    return isBuiltinKind(kind) || this.custom.has(kind);
  }

  /** Names of all kinds, built-in first. */
  list(): string[] {
    return [...Object.keys(BUILTIN_KINDS), ...this.custom.keys()];
  }

  /** Typed binding for a built-in kind. */
  bindBuiltin<K extends BuiltinKind>(kind: K): KindBinding<ValueKindMap[K]> {
    const definition: KindDefinition<ValueKindMap[K]> = BUILTIN_KINDS[kind];
    const override = this.typeParsers.get(kind);
    const typeParser: ParseFn<ValueKindMap[K]> | undefined = override
      ? (token) => {
          const parsed = override(token);
          if (!definition.is(parsed)) {
            throw new ParseError(`Type-level parser for ${kind} returned a ${typeof parsed}`, { token });
          }
          return parsed;
        }
      : undefined;
    return {
      kind,
      typeName: definition.typeName,
      coerce: (token) => definition.parse(token),
      typeParser,
      implicitDefault: definition.implicitDefault,
      splittable: definition.splittable,
    };
  }

  /**
   * Binding for any registered kind.
   *
   * @throws SchemaError(UNKNOWN_VALUE_KIND)
   */
  resolve(kind: string): KindBinding<unknown> {
    if (isBuiltinKind(kind)) return this.bindBuiltin(kind);
    const binding = this.custom.get(kind);
    if (!binding) throw unknownKind(kind);
    return { ...binding, typeParser: this.typeParsers.get(kind) };
  }
}

function unknownKind(kind: string): SchemaError {
  return new SchemaError(`Unknown value kind "${kind}"`, {
    code: ErrorCode.UNKNOWN_VALUE_KIND,
    argument: kind,
  });
}

export function createValueKindRegistry(): ValueKindRegistry {
  return new ValueKindRegistry();
}
