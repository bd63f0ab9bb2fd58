import { date, datetime, time } from "./datetime-functions.js";
import type { MessageFunction } from "./function-context.js";
import { currency, integer, math, number, offset, percent, unit } from "./number-functions.js";
import { string } from "./string-function.js";

export type FunctionTable = Readonly<Record<string, MessageFunction>>;

export const DefaultFunctions: FunctionTable = Object.freeze({
  integer,
  number,
  offset,
  string,
});

export const DraftFunctions: FunctionTable = Object.freeze({
  currency,
  date,
  datetime,
  math,
  percent,
  time,
  unit,
});

/**
 * Name → function lookup. Names are matched exactly; every registry owns its
 * entries, so clones and merges never alias another registry's table.
 */
export class FunctionRegistry {
  private readonly functions: Map<string, MessageFunction>;

  constructor(...tables: FunctionTable[]) {
    this.functions = new Map(tables.flatMap((table) => Object.entries(table)));
  }

  public register(name: string, fn: MessageFunction): this {
    if (!name) throw new Error("Function name must not be empty");
    this.functions.set(name, fn);
    return this;
  }

  public get(name: string): MessageFunction | undefined {
    return this.functions.get(name);
  }

  public has(name: string): boolean {
    return this.functions.has(name);
  }

  /** Registered names, in registration order. */
  public list(): string[] {
    return [...this.functions.keys()];
  }

  public clone(): FunctionRegistry {
    const copy = new FunctionRegistry();
    for (const [name, fn] of this.functions) copy.functions.set(name, fn);
    return copy;
  }

  /** Adds every entry of `other`; its functions replace same-named ones. */
  public merge(other: FunctionRegistry): this {
    for (const [name, fn] of other.functions) this.functions.set(name, fn);
    return this;
  }
}

export interface RegistryOptions {
  /** Also register the draft functions. */
  draft?: boolean;
}

export function createFunctionRegistry(options: RegistryOptions = {}): FunctionRegistry {
  return options.draft ? new FunctionRegistry(DefaultFunctions, DraftFunctions) : new FunctionRegistry(DefaultFunctions);
}
