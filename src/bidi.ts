export type Direction = "ltr" | "rtl" | "auto";

export const LRI = "\u2066";
export const RLI = "\u2067";
export const FSI = "\u2068";
export const PDI = "\u2069";

export type IsolationChar = typeof LRI | typeof RLI | typeof FSI | typeof PDI;

const RTL_LANGUAGES = new Set(["ar", "he", "fa", "ur", "yi"]);

// [first, last] code point ranges of right-to-left blocks
const RTL_RANGES: ReadonlyArray<readonly [number, number]> = [
  [0x0590, 0x05ff], // Hebrew
  [0x0600, 0x06ff], // Arabic
  [0x0700, 0x074f], // Syriac
  [0x0750, 0x077f], // Arabic Supplement
  [0x0780, 0x07bf], // Thaana
  [0x07c0, 0x07ff], // NKo
  [0x0800, 0x083f], // Samaritan
  [0x08a0, 0x08ff], // Arabic Extended-A
  [0xfb1d, 0xfb4f], // Hebrew presentation forms
  [0xfb50, 0xfdff], // Arabic Presentation Forms-A
  [0xfe70, 0xfeff], // Arabic Presentation Forms-B
];

const LTR_RANGES: ReadonlyArray<readonly [number, number]> = [
  [0x0041, 0x005a],
  [0x0061, 0x007a],
  [0x00c0, 0x024f], // Latin-1 Supplement, Latin Extended-A/B
  [0x0400, 0x04ff], // Cyrillic
];

const LETTER_RE = /^\p{L}$/u;

export function parseDirection(value: string): Direction {
  return value === "ltr" || value === "rtl" ? value : "auto";
}

/**
 * Direction of the first strongly directional character in `text`,
 * or `"auto"` when there is none.
 */
export function getDirection(text: string): Direction {
  for (const char of text) {
    const cp = char.codePointAt(0) ?? 0;
    if (inRanges(cp, RTL_RANGES)) return "rtl";
    if (inRanges(cp, LTR_RANGES) || LETTER_RE.test(char)) return "ltr";
  }
  return "auto";
}

export function getLocaleDirection(locale: string): "ltr" | "rtl" {
  const [language = ""] = locale.split("-");
  return RTL_LANGUAGES.has(language.toLowerCase()) ? "rtl" : "ltr";
}

export function wrapWithIsolation(text: string, dir: string): string {
  switch (dir) {
    case "ltr":
      return `${LRI}${text}${PDI}`;
    case "rtl":
      return `${RLI}${text}${PDI}`;
    case "auto":
      return `${FSI}${text}${PDI}`;
    default:
      return text;
  }
}

export function isIsolationChar(char: string): char is IsolationChar {
  return char === LRI || char === RLI || char === FSI || char === PDI;
}

function inRanges(cp: number, ranges: ReadonlyArray<readonly [number, number]>): boolean {
  return ranges.some(([first, last]) => cp >= first && cp <= last);
}
