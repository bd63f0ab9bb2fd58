import { MessageSelectionError } from "./errors.js";
import { MessageValue, type NumberPart, type ValueInit } from "./message-value.js";
import { createNumberFormat, selectNumberKeys, type NumberOptions, type NumericValue } from "./number-format.js";

export interface NumberValueInit extends Omit<ValueInit, "options"> {
  options: NumberOptions;
  selectable?: boolean;
}

/**
 * A formatted number. The formatter is built on construction, so invalid
 * option combinations surface as a `RangeError` from the constructor.
 */
export class NumberValue extends MessageValue<"number"> {
  public override readonly type = "number";
  public override readonly selectable: boolean;
  public readonly numberOptions: Readonly<NumberOptions>;
  private readonly formatter: Intl.NumberFormat;

  constructor(
    private readonly value: NumericValue,
    init: NumberValueInit
  ) {
    super(init);
    this.numberOptions = Object.freeze({ ...init.options });
    this.selectable = init.selectable ?? true;
    this.formatter = createNumberFormat(init.locale, init.options);
    Object.freeze(this);
  }

  public override valueOf(): NumericValue {
    return this.value;
  }

  public override toString(): string {
    return this.formatter.format(this.value);
  }

  public override toParts(): NumberPart[] {
    return [
      {
        type: "number",
        source: this.source,
        locale: this.locale,
        dir: this.dir,
        parts: this.formatter.formatToParts(this.value),
      },
    ];
  }

  public override selectKeys(keys: readonly string[]): string[] {
    if (!this.selectable) throw new MessageSelectionError("not-selectable", this.source);
    return selectNumberKeys(this.value, this.numberOptions, this.locale, keys);
  }
}
