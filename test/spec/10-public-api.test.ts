import { describe, it, expect, vi, afterEach } from "vitest";
import {
  DEFAULT_CONFIG,
  FallbackValue,
  MessageDataModelError,
  MessageResolutionError,
  badFunctionResult,
  buildMessage,
  callFunction,
  createContext,
  createRegistry,
  emitWarning,
  isMessageError,
  resolveConfig,
  stringifyMessage,
  unresolvedVariable,
  type MessageError,
} from "../../src/index.js";
import {
  catchall,
  expression,
  functionRef,
  input,
  literal,
  pattern,
  selectMessage,
  text,
  variable,
  variant,
} from "../cst.js";

function collecting(): { errors: MessageError[]; onError: (error: MessageError) => void } {
  const errors: MessageError[] = [];
  return { errors, onError: (error) => errors.push(error) };
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe("resolveConfig", () => {
  it("fills in the defaults", () => {
    expect(resolveConfig()).toStrictEqual({
      locales: ["en"],
      localeMatcher: "best fit",
      draft: false,
      onError: emitWarning,
    });
  });

  it("keeps given settings and replaces an empty locale list", () => {
    const { onError } = collecting();
    const config = resolveConfig({ locales: [], localeMatcher: "lookup", draft: true, onError });

    expect(config).toStrictEqual({ locales: ["en"], localeMatcher: "lookup", draft: true, onError });
  });

  it("freezes the defaults", () => {
    expect(Object.isFrozen(DEFAULT_CONFIG)).toBe(true);
    expect(Object.isFrozen(DEFAULT_CONFIG.locales)).toBe(true);
  });
});

describe("createContext", () => {
  it("carries the configuration and expression details", () => {
    const ctx = createContext(resolveConfig({ locales: ["fr", "en"] }), "$x", {
      dir: "rtl",
      id: "msg-1",
      literalOptionKeys: ["select"],
    });

    expect(ctx.locale).toBe("fr");
    expect(ctx.locales).toStrictEqual(["fr", "en"]);
    expect(ctx.source).toBe("$x");
    expect(ctx.dir).toBe("rtl");
    expect(ctx.id).toBe("msg-1");
    expect(ctx.literalOptionKeys.has("select")).toBe(true);
  });
});

describe("createRegistry", () => {
  it("includes the draft functions only when asked", () => {
    expect(createRegistry(resolveConfig()).has("date")).toBe(false);
    expect(createRegistry(resolveConfig({ draft: true })).has("date")).toBe(true);
  });
});

describe("callFunction", () => {
  it("calls a default function", () => {
    const { errors, onError } = collecting();

    expect(callFunction("number", 42, {}, { onError }).toString()).toBe("42");
    expect(callFunction("integer", "2.5", {}, { onError }).toString()).toBe("3");
    expect(callFunction("string", 7, {}, { onError }).toString()).toBe("7");
    expect(errors).toStrictEqual([]);
  });

  it("formats for the configured locale", () => {
    expect(callFunction("number", 1234.5, {}, { locales: ["de"] }).toString()).toBe("1.234,5");
  });

  it("throws for a function that is not registered", () => {
    expect(() => callFunction("currency", 42, { currency: "EUR" })).toThrowError("Unknown function: currency");
  });

  it("calls draft functions when enabled", () => {
    expect(callFunction("currency", 42, { currency: "EUR" }, { draft: true }).toString()).toBe("€42.00");
  });

  it("attributes errors to the function by default", () => {
    const { errors, onError } = collecting();
    const value = callFunction("number", "many", {}, { onError });

    expect(value).toBeInstanceOf(FallbackValue);
    expect(value.toString()).toBe("{:number}");
    expect(errors).toHaveLength(1);
    expect(errors[0]).toBeInstanceOf(MessageResolutionError);
    expect(errors[0]).toMatchObject({ type: "bad-operand", source: ":number" });
  });

  it("attributes errors to the given source", () => {
    const { errors, onError } = collecting();

    expect(callFunction("number", "many", {}, { onError }, { source: "$count" }).toString()).toBe("{$count}");
    expect(errors[0]).toMatchObject({ source: "$count" });
  });

  it("passes literal option names to the function", () => {
    const value = callFunction("number", 2, { select: "ordinal" }, {}, { literalOptionKeys: ["select"] });

    expect(value.selectKeys(["one", "two", "other"])).toStrictEqual(["two"]);
  });

  it("emits a process warning when no handler is configured", () => {
    const warn = vi.spyOn(process, "emitWarning").mockImplementation(() => undefined);

    callFunction("number", "many");

    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith("Input is not numeric", {
      type: "MessageResolutionError",
      code: "bad-operand",
      detail: "bad-operand",
    });
  });
});

describe("buildMessage", () => {
  const count = () => [input(expression({ arg: variable("count"), functionRef: functionRef("number") }))];

  it("converts and validates a syntax tree", () => {
    const cst = selectMessage(
      count(),
      [variable("count")],
      [variant([literal("one")], pattern(text("One"))), variant([catchall()], pattern(text("Many")))]
    );
    const msg = buildMessage(cst);

    expect(msg.type).toBe("select");
    expect(stringifyMessage(msg)).toBe(".input {$count :number}\n.match $count\none {{One}}\n* {{Many}}");
  });

  it("throws for a message without a fallback variant", () => {
    const cst = selectMessage(count(), [variable("count")], [variant([literal("one")], pattern(text("One")))]);
    const build = () => buildMessage(cst);

    expect(build).toThrowError(MessageDataModelError);
    expect(build).toThrowError("missing-fallback");
  });
});

describe("isMessageError", () => {
  it("recognizes errors raised by this package", () => {
    expect(isMessageError(new MessageDataModelError("key-mismatch"))).toBe(true);
    expect(isMessageError(new Error("other"))).toBe(false);
  });

  it("describes errors with their code", () => {
    const error = new MessageResolutionError("bad-option", "Bad digits", "$n");

    expect(String(error)).toBe("MessageResolutionError [bad-option] {$n} Bad digits");
    expect(String(new MessageDataModelError("key-mismatch", { start: 4, end: 9 }))).toBe(
      "MessageDataModelError [key-mismatch] [Position 4-9] key-mismatch at 4"
    );
  });

  it("builds resolution errors for the caller", () => {
    const error = unresolvedVariable("user", "$user");

    expect(error).toMatchObject({ type: "unresolved-variable", code: "unresolved-variable", source: "$user" });
    expect(error.message).toBe("Variable not available: $user");
  });

  it("builds errors for a custom function's bad result", () => {
    const error = badFunctionResult("Expected a message value", ":custom");

    expect(error).toBeInstanceOf(MessageResolutionError);
    expect(String(error)).toBe("MessageResolutionError [bad-function-result] {:custom} Expected a message value");
  });
});
