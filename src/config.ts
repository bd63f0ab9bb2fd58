import type { Direction } from "./bidi.js";
import type { MessageError } from "./errors.js";
import {
  DEFAULT_LOCALE,
  FunctionContext,
  type ErrorHandler,
  type LocaleMatcher,
  type MessageFunctionContext,
} from "./function-context.js";
import { createFunctionRegistry, type FunctionRegistry } from "./function-registry.js";

export interface ResolutionConfig {
  locales: readonly string[];
  localeMatcher: LocaleMatcher;
  /** Register the draft functions alongside the default ones. */
  draft: boolean;
  onError: ErrorHandler;
}

export function emitWarning(error: MessageError): void {
  process.emitWarning(error.message, { type: error.name, code: error.code, detail: error.type });
}

export const DEFAULT_CONFIG: Readonly<ResolutionConfig> = Object.freeze<ResolutionConfig>({
  locales: Object.freeze([DEFAULT_LOCALE]),
  localeMatcher: "best fit",
  draft: false,
  onError: emitWarning,
});

export function resolveConfig(config: Partial<ResolutionConfig> = {}): ResolutionConfig {
  const locales = config.locales?.length ? [...config.locales] : [...DEFAULT_CONFIG.locales];
  return {
    locales,
    localeMatcher: config.localeMatcher ?? DEFAULT_CONFIG.localeMatcher,
    draft: config.draft ?? DEFAULT_CONFIG.draft,
    onError: config.onError ?? DEFAULT_CONFIG.onError,
  };
}

export interface ExpressionContext {
  literalOptionKeys?: Iterable<string>;
  dir?: Direction;
  id?: string;
}

/**
 * Context for resolving the expression whose fallback representation is
 * `source`.
 */
export function createContext(
  config: ResolutionConfig,
  source: string,
  extra: ExpressionContext = {}
): MessageFunctionContext {
  return new FunctionContext({
    locales: config.locales,
    source,
    localeMatcher: config.localeMatcher,
    onError: config.onError,
    ...extra,
  });
}

export function createRegistry(config: ResolutionConfig): FunctionRegistry {
  return createFunctionRegistry({ draft: config.draft });
}
