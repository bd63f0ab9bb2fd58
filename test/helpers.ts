import type { MessageError } from "../src/errors.js";
import { FunctionContext, type FunctionContextInit } from "../src/function-context.js";

export interface CollectingContext {
  ctx: FunctionContext;
  errors: MessageError[];
}

/** An English context for `$x` that records every reported error. */
export function collect(init: Partial<FunctionContextInit> = {}): CollectingContext {
  const errors: MessageError[] = [];
  const ctx = new FunctionContext({
    locales: ["en"],
    source: "$x",
    onError: (error) => {
      errors.push(error);
    },
    ...init,
  });
  return { ctx, errors };
}

export function errorTypes(errors: MessageError[]): string[] {
  return errors.map((error) => error.type);
}
