/**
 * Runtime Option: a named, prefix-identified wrapper around one Value.
 */

import type { BuiltinKind, ValueKindMap } from "@argweave/sdk";
import type { ValueVariant } from "./values/variant.js";

export interface OptionInit {
  name: string;
  shortName?: string;
  longName?: string;
  description?: string;
  group?: string;
  value: ValueVariant;
}

export class Option {
  readonly name: string;
  readonly shortName?: string;
  readonly longName?: string;
  readonly description: string;
  readonly group?: string;
  readonly value: ValueVariant;

  constructor(init: OptionInit) {
    this.name = init.name;
    this.shortName = init.shortName;
    this.longName = init.longName;
    this.description = init.description ?? "";
    this.group = init.group;
    this.value = init.value;
  }

  /** Boolean Options never consume a following token. */
  get isBool(): boolean {
    return this.value.kind === "bool";
  }

  get isSet(): boolean {
    return this.value.isSet;
  }

  set(token: string): void {
    this.value.set(token);
  }

  get(): unknown {
    return this.value.get();
  }

  getAll(): unknown[] {
    return this.value.getAll();
  }

  getAs<K extends BuiltinKind>(kind: K): ValueKindMap[K] {
    return this.value.getAs(kind);
  }
}
