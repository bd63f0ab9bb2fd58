import { createContext, createRegistry, resolveConfig, type ExpressionContext, type ResolutionConfig } from "./config.js";
import { fromCST } from "./from-cst.js";
import type { MessageValue } from "./message-value.js";
import { validate } from "./model-validate.js";
import type * as CST from "./cst.js";
import type { Message } from "./types.js";

export {
  FSI,
  LRI,
  PDI,
  RLI,
  getDirection,
  getLocaleDirection,
  isIsolationChar,
  parseDirection,
  wrapWithIsolation,
} from "./bidi.js";
export {
  MessageDataModelError,
  MessageError,
  MessageResolutionError,
  MessageSelectionError,
  MessageSyntaxError,
  badFunctionResult,
  badOperand,
  badOption,
  isMessageError,
  unresolvedVariable,
  unsupportedOperation,
} from "./errors.js";
export {
  FALLBACK_SOURCE,
  FallbackValue,
  MessageValue,
  StringValue,
  UnknownValue,
  fallback,
  isMessageValue,
} from "./message-value.js";
export { NumberValue } from "./number-value.js";
export { DateTimeValue } from "./datetime-value.js";
export { DEFAULT_LOCALE, FunctionContext } from "./function-context.js";
export { DefaultFunctions, DraftFunctions, FunctionRegistry, createFunctionRegistry } from "./function-registry.js";
export {
  applyOptionSchema,
  asBoolean,
  asPositiveInteger,
  asString,
  defineSchema,
  extendSchema,
  fieldsOf,
  oneOf,
} from "./option-schema.js";
export { currency, integer, math, number, offset, percent, readNumericOperand, unit } from "./number-functions.js";
export { string } from "./string-function.js";
export { date, datetime, readDateTimeOperand, time } from "./datetime-functions.js";
export { formatNumber, formatNumberToParts, scalePercent, selectNumberKeys } from "./number-format.js";
export { fromCST } from "./from-cst.js";
export {
  isCatchallKey,
  isDeclaration,
  isExpression,
  isFunctionRef,
  isLiteral,
  isMarkup,
  isMessage,
  isPatternMessage,
  isSelectMessage,
  isText,
  isVariableRef,
} from "./model-guards.js";
export { validate } from "./model-validate.js";
export { stringifyMessage } from "./stringify.js";
export { DEFAULT_CONFIG, createContext, createRegistry, emitWarning, resolveConfig } from "./config.js";

/**
 * Builds and validates the data model of a parsed message.
 */
export function buildMessage(cst: CST.Message): Message {
  const msg = fromCST(cst);
  validate(msg);
  return msg;
}

/**
 * Resolves one function call against a registry built from `config`.
 * Throws for a name that is not registered.
 */
export function callFunction(
  name: string,
  operand: unknown,
  options: Record<string, unknown> = {},
  config: Partial<ResolutionConfig> = {},
  extra: ExpressionContext & { source?: string } = {}
): MessageValue {
  const resolved = resolveConfig(config);
  const fn = createRegistry(resolved).get(name);
  if (!fn) throw new Error(`Unknown function: ${name}`);
  const { source = `:${name}`, ...expression } = extra;
  return fn(createContext(resolved, source, expression), options, operand);
}

export type { Direction, IsolationChar } from "./bidi.js";
export type {
  DataModelErrorCode,
  MessageErrorType,
  ResolutionErrorType,
  SelectionErrorCode,
  SyntaxErrorCode,
} from "./errors.js";
export type {
  BidiIsolationPart,
  DateTimePart,
  FallbackPart,
  MarkupPart,
  MessagePart,
  NumberPart,
  StringPart,
  TextPart,
  UnknownPart,
} from "./message-value.js";
export type {
  ErrorHandler,
  FunctionContextInit,
  LocaleMatcher,
  MessageFunction,
  MessageFunctionContext,
} from "./function-context.js";
export type { OptionCoercer, OptionField, OptionSchema } from "./option-schema.js";
export type { FunctionTable, RegistryOptions } from "./function-registry.js";
export type { NumberOptions, NumberSelect, NumberStyle, NumericInput, NumericValue } from "./number-format.js";
export type { DateTimeOptions } from "./datetime-value.js";
export type { ValidationErrorHandler, ValidationResult } from "./model-validate.js";
export type { ExpressionContext, ResolutionConfig } from "./config.js";
export type { CST };
export type {
  Attributes,
  CatchallKey,
  Declaration,
  Expression,
  FunctionRef,
  InputDeclaration,
  Literal,
  LocalDeclaration,
  Markup,
  Message,
  Node,
  Options,
  Pattern,
  PatternElement,
  PatternMessage,
  SelectMessage,
  Variant,
  VariantKey,
  VariableRef,
  VariableRefExpression,
} from "./types.js";
