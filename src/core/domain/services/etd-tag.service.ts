import type { ILogger } from "./logger.service.js";

export interface EtdTag {
  /** Departure date as `DD-Mon` (e.g. "08-Aug"). */
  etd: string | null;
  tag: string | null;
}

const MONTH_ABBREVIATIONS = [
  "Jan",
  "Feb",
  "Mar",
  "Apr",
  "May",
  "Jun",
  "Jul",
  "Aug",
  "Sep",
  "Oct",
  "Nov",
  "Dec",
];

// "2024.08.08.(AIR)" first; the second form accepts "2024.8.8 (AIR)".
const STRICT_PATTERN = /(\d{4})\.(\d{1,2})\.(\d{1,2})\.\s*\(([^)]+)\)/;
const LOOSE_PATTERN = /(\d{4})\.(\d{1,2})\.(\d{1,2})\s*\(([^)]+)\)/;

interface RawEtdMatch {
  dateText: string;
  year: number;
  month: number;
  day: number;
  tag: string;
}

export class EtdTagService {
  /**
   * Extracts the departure date and the parenthesized tag from a free-text
   * cell such as "ETD 2024.08.08.(AIR)".
   * A date that does not exist on the calendar yields `etd: null` but keeps
   * the tag.
   */
  static parse(text: unknown, logger?: ILogger): EtdTag {
    if (typeof text !== "string") {
      logger?.log({
        level: "warn",
        message: `ETD source is not text (${describe(text)}); cannot extract date or tag.`,
      });
      return { etd: null, tag: null };
    }

    const match = EtdTagService.match(text);
    if (!match) {
      logger?.log({
        level: "warn",
        message: `ETD source does not match "YYYY.M.D.(TAG)": '${text}'.`,
        value: text,
      });
      return { etd: null, tag: null };
    }

    const etd = EtdTagService.formatDayMonth(match.year, match.month, match.day);
    if (etd === null) {
      logger?.log({
        level: "warn",
        message: `ETD date '${match.dateText}' in '${text}' is not a valid calendar date.`,
        value: text,
      });
    }
    return { etd, tag: match.tag };
  }

  /** `DD-Mon` for a real calendar date, otherwise null. */
  static formatDayMonth(year: number, month: number, day: number): string | null {
    if (year < 1 || month < 1 || month > 12 || day < 1) return null;
    const lastDay = new Date(Date.UTC(year, month, 0)).getUTCDate();
    if (day > lastDay) return null;
    return `${String(day).padStart(2, "0")}-${MONTH_ABBREVIATIONS[month - 1]}`;
  }

  private static match(text: string): RawEtdMatch | null {
    for (const pattern of [STRICT_PATTERN, LOOSE_PATTERN]) {
      const m = pattern.exec(text);
      if (!m) continue;
      const [, year, month, day, tag] = m;
      return {
        dateText: `${year}.${month}.${day}`,
        year: Number(year),
        month: Number(month),
        day: Number(day),
        tag,
      };
    }
    return null;
  }
}

function describe(value: unknown): string {
  if (value === null) return "null";
  if (value === undefined) return "undefined";
  if (value instanceof Date) return "date";
  return typeof value;
}
