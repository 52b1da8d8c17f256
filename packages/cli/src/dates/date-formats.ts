import { DateTime } from "luxon";
import { UsageError } from "../errors.js";

export const INPUT_FORMATS = ["month-day-year", "DD.MM.YYYY", "YYYY-MM-DD", "MM-DD-YYYY"] as const;

export type InputFormat = (typeof INPUT_FORMATS)[number];

/** Output shorthands, mapped to luxon format tokens */
const OUTPUT_SHORTHANDS: Record<string, string> = {
  "YYYY-MM-DD": "yyyy-MM-dd",
  "DD.MM.YYYY": "dd.MM.yyyy",
  "DD.MM": "dd.MM",
  "MM-DD": "MM-dd",
  "YYYY-MM": "yyyy-MM",
  "MM.DD": "MM.dd",
};

const MONTHS =
  "January|February|March|April|May|June|July|August|September|October|November|December";

interface DatePattern {
  format: InputFormat;
  /** Regex source without capture groups */
  source: string;
  parse: (text: string) => DateTime;
}

function fromParts(year: string, month: string, day: string): DateTime {
  return DateTime.fromObject({
    year: Number(year),
    month: Number(month),
    day: Number(day),
  });
}

const PATTERNS: DatePattern[] = [
  {
    // December 30, 2024
    format: "month-day-year",
    source: `\\b(?:${MONTHS})\\s+\\d{1,2},\\s+\\d{4}\\b`,
    parse: (text) =>
      DateTime.fromFormat(text.replace(/\s+/g, " "), "MMMM d, yyyy", { locale: "en-US" }),
  },
  {
    // 30.12.2024
    format: "DD.MM.YYYY",
    source: "\\b\\d{1,2}\\.\\d{1,2}\\.\\d{4}\\b",
    parse: (text) => {
      const [day, month, year] = text.split(".");
      return fromParts(year, month, day);
    },
  },
  {
    // 2024-12-30
    format: "YYYY-MM-DD",
    source: "\\b\\d{4}-\\d{1,2}-\\d{1,2}\\b",
    parse: (text) => {
      const [year, month, day] = text.split("-");
      return fromParts(year, month, day);
    },
  },
  {
    // 12-30-2024
    format: "MM-DD-YYYY",
    source: "\\b\\d{1,2}-\\d{1,2}-\\d{4}\\b",
    parse: (text) => {
      const [month, day, year] = text.split("-");
      return fromParts(year, month, day);
    },
  },
];

function isInputFormat(name: string): name is InputFormat {
  return INPUT_FORMATS.some((format) => format === name);
}

/**
 * Resolve an output format shorthand to a luxon format string.
 * Anything that is not a shorthand is taken as a luxon format already.
 */
export function resolveOutputFormat(format: string): string {
  return OUTPUT_SHORTHANDS[format] ?? format;
}

/**
 * Parse a comma-separated list of input format names.
 * Undefined, empty or "all" selects every format.
 */
export function parseInputFormats(list?: string): InputFormat[] {
  const names = (list ?? "")
    .split(",")
    .map((name) => name.trim())
    .filter((name) => name !== "");

  if (names.length === 0 || names.includes("all")) {
    return [...INPUT_FORMATS];
  }

  return names.map((name) => {
    if (!isInputFormat(name)) {
      throw new UsageError(
        `Unknown input format "${name}" (expected one of: ${INPUT_FORMATS.join(", ")}, all)`
      );
    }
    return name;
  });
}

export interface ConvertDatesOptions {
  /** Output shorthand or luxon format string */
  outputFormat?: string;
  inputFormats?: readonly InputFormat[];
}

export interface ConvertDatesResult {
  content: string;
  converted: number;
}

/**
 * Rewrite every recognised date in `content` to one output format.
 * All input formats are matched in a single pass, so a converted date is never
 * matched again. Matches that are not real calendar dates stay untouched.
 */
export function convertDates(content: string, options: ConvertDatesOptions = {}): ConvertDatesResult {
  const outputFormat = resolveOutputFormat(options.outputFormat ?? "YYYY-MM-DD");
  const enabled = options.inputFormats ?? INPUT_FORMATS;
  const patterns = PATTERNS.filter((pattern) => enabled.includes(pattern.format));

  if (patterns.length === 0) {
    return { content, converted: 0 };
  }

  const regex = new RegExp(patterns.map((pattern) => `(${pattern.source})`).join("|"), "g");

  let result = "";
  let cursor = 0;
  let converted = 0;

  let match;
  while ((match = regex.exec(content)) !== null) {
    const groupIndex = match.findIndex((group, index) => index > 0 && group !== undefined);
    const pattern = patterns[groupIndex - 1];
    const date = pattern.parse(match[0]);
    if (!date.isValid) continue;

    result += content.slice(cursor, match.index) + date.toFormat(outputFormat);
    cursor = match.index + match[0].length;
    converted++;
  }

  return { content: result + content.slice(cursor), converted };
}
