const PERSIAN_ZERO = 0x06f0;
const ARABIC_INDIC_ZERO = 0x0660;

export const NUMBER_CAPTURE = "(\\d+(?:[.,]\\d+)*)";
export const NUMBER_LIST_CAPTURE =
  "(\\d+(?:[.,]\\d+)*(?:(?:[ \\t]*[/|;][ \\t]*|,[ \\t]+|[ \\t]+)\\d+(?:[.,]\\d+)*)*)";

/** Maps Persian and Arabic-Indic digits (and the Arabic decimal separator) to ASCII. */
export function normalizeDigits(text: string): string {
  return text.replace(/[\u06f0-\u06f9\u0660-\u0669\u066b]/g, (char) => {
    const code = char.charCodeAt(0);
    if (code === 0x066b) {
      return ".";
    }
    const zero = code >= PERSIAN_ZERO ? PERSIAN_ZERO : ARABIC_INDIC_ZERO;
    return String(code - zero);
  });
}

function resolveSeparators(token: string): string {
  const lastDot = token.lastIndexOf(".");
  const lastComma = token.lastIndexOf(",");

  if (lastDot !== -1 && lastComma !== -1) {
    const decimal = lastDot > lastComma ? "." : ",";
    const thousands = decimal === "." ? "," : ".";
    return token.split(thousands).join("").replace(decimal, ".");
  }

  const separator = lastDot !== -1 ? "." : lastComma !== -1 ? "," : undefined;
  if (!separator) {
    return token;
  }

  const parts = token.split(separator);
  if (parts.length > 2) {
    return parts.join("");
  }

  const [whole = "", fraction = ""] = parts;
  // "2,650" reads as thousands, "140,2" and "0,850" as decimals.
  const groupedThousands =
    separator === "," && fraction.length === 3 && whole.length <= 3 && !whole.startsWith("0");
  return groupedThousands ? `${whole}${fraction}` : `${whole}.${fraction}`;
}

export function parseNumericToken(raw: string): number | undefined {
  const token = normalizeDigits(raw).replace(/\s+/g, "");
  if (!/^\d+(?:[.,]\d+)*$/.test(token)) {
    return undefined;
  }
  const result = Number.parseFloat(resolveSeparators(token));
  return Number.isFinite(result) ? result : undefined;
}

// A bare comma between whole prices of four or more digits, or between
// dotted decimals, separates two values: "2010,2020" and "1.0900,1.0950".
function splitCommaRun(token: string): string[] {
  const parts = token.split(",");
  if (parts.length < 2) {
    return [token];
  }
  const separate = parts.every((part) => /^\d{4,}$/.test(part)) || parts.every((part) => /^\d+\.\d+$/.test(part));
  return separate ? parts : [token];
}

/** Splits a captured run such as "1.0900 1.0950" or "2660/2670, 2680" into numbers. */
export function splitNumberList(raw: string): number[] {
  return raw
    .split(/[ \t]*[/|;][ \t]*|,[ \t]+|[ \t]+/)
    .flatMap(splitCommaRun)
    .map((token) => parseNumericToken(token))
    .filter((value): value is number => value !== undefined);
}
