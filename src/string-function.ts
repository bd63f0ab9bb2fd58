import type { MessageFunctionContext } from "./function-context.js";
import { MessageValue, StringValue } from "./message-value.js";

/**
 * `:string` formats any operand as text. Resolved values contribute their
 * formatted form; a missing operand is the empty string.
 */
export function string(ctx: MessageFunctionContext, _options: Record<string, unknown>, operand?: unknown): StringValue {
  const value = operand == null ? "" : operand instanceof MessageValue ? operand.toString() : String(operand);
  return new StringValue(value, { source: ctx.source, locale: ctx.locale, dir: ctx.dir ?? "auto" });
}
