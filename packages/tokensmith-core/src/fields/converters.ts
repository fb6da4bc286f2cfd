export type PrimitiveKind =
  | "boolean"
  | "integer"
  | "float"
  | "decimal"
  | "date"
  | "datetime"
  | "time"
  | "uuid"
  | "text";

export type TimeOfDay = {
  hour: number;
  minute: number;
  second: number;
  microsecond: number;
};

export type PrimitiveValueMap = {
  boolean: boolean;
  integer: number;
  float: number;
  decimal: string;
  date: Date;
  datetime: Date;
  time: TimeOfDay;
  uuid: string;
  text: string;
};

export type Converter<T> = {
  pattern: string;
  parse: (text: string) => T;
  format: (value: T) => string;
};

const DATE_PATTERN = String.raw`\d{4}-\d{2}-\d{2}`;
const TIME_PATTERN = String.raw`\d{2}:\d{2}:\d{2}(?:\.\d{1,6})?`;
const DECIMAL_PATTERN = String.raw`[-+]?(?:\d+(?:\.\d*)?|\.\d+)`;

const DATE_PARTS = /^(\d{4})-(\d{2})-(\d{2})$/;
const TIME_PARTS = /^(\d{2}):(\d{2}):(\d{2})(?:\.(\d{1,6}))?$/;
const DATETIME_PARTS = /^(\d{4}-\d{2}-\d{2})[ T](.+)$/;
const DECIMAL_TEXT = new RegExp(`^${DECIMAL_PATTERN}$`);
const UUID_TEXT = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

// Date.UTC reads years 0-99 as 1900-1999; setUTCFullYear takes them as written.
function utcDate(year: number, month: number, day: number, time?: TimeOfDay): Date {
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  if (time) {
    date.setUTCHours(time.hour, time.minute, time.second, Math.floor(time.microsecond / 1000));
  }
  return date;
}

function parseCalendarDate(text: string): { year: number; month: number; day: number } {
  const parts = DATE_PARTS.exec(text);
  if (!parts) {
    throw new Error(`"${text}" is not a YYYY-MM-DD date`);
  }
  const year = Number(parts[1]);
  const month = Number(parts[2]);
  const day = Number(parts[3]);
  const probe = utcDate(year, month, day);
  if (
    probe.getUTCFullYear() !== year ||
    probe.getUTCMonth() !== month - 1 ||
    probe.getUTCDate() !== day
  ) {
    throw new Error(`"${text}" is not a calendar date`);
  }
  return { year, month, day };
}

function parseTimeOfDay(text: string): TimeOfDay {
  const parts = TIME_PARTS.exec(text);
  if (!parts) {
    throw new Error(`"${text}" is not an HH:MM:SS time`);
  }
  const hour = Number(parts[1]);
  const minute = Number(parts[2]);
  const second = Number(parts[3]);
  if (hour > 23 || minute > 59 || second > 59) {
    throw new Error(`"${text}" is out of range for a time of day`);
  }
  const fraction = parts[4] ?? "";
  return {
    hour,
    minute,
    second,
    microsecond: fraction.length > 0 ? Number(fraction.padEnd(6, "0")) : 0,
  };
}

function pad(value: number, width: number): string {
  return String(value).padStart(width, "0");
}

function formatFraction(microsecond: number): string {
  if (microsecond === 0) {
    return "";
  }
  return `.${pad(microsecond, 6).replace(/0+$/u, "")}`;
}

function formatTimeOfDay(value: TimeOfDay): string {
  return `${pad(value.hour, 2)}:${pad(value.minute, 2)}:${pad(value.second, 2)}${formatFraction(value.microsecond)}`;
}

function assertValidDate(value: Date): void {
  if (Number.isNaN(value.getTime())) {
    throw new Error("invalid Date");
  }
}

function formatDate(value: Date): string {
  assertValidDate(value);
  return `${pad(value.getUTCFullYear(), 4)}-${pad(value.getUTCMonth() + 1, 2)}-${pad(value.getUTCDate(), 2)}`;
}

export const CONVERTERS: { [K in PrimitiveKind]: Converter<PrimitiveValueMap[K]> } = {
  boolean: {
    pattern: "[Tt][Rr][Uu][Ee]|[Ff][Aa][Ll][Ss][Ee]|1|0",
    parse: (text) => {
      const lowered = text.toLowerCase();
      if (lowered === "true" || lowered === "1") {
        return true;
      }
      if (lowered === "false" || lowered === "0") {
        return false;
      }
      throw new Error(`"${text}" is not a boolean`);
    },
    format: (value) => (value ? "true" : "false"),
  },
  integer: {
    pattern: String.raw`[-+]?\d+`,
    parse: (text) => {
      const value = Number(text);
      if (!Number.isSafeInteger(value)) {
        throw new Error(`"${text}" is not a safe integer`);
      }
      return value;
    },
    format: (value) => {
      if (!Number.isInteger(value)) {
        throw new Error(`${value} is not an integer`);
      }
      return String(value);
    },
  },
  float: {
    pattern: String.raw`[-+]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][-+]?\d+)?`,
    parse: (text) => {
      const value = Number(text);
      if (!Number.isFinite(value)) {
        throw new Error(`"${text}" is out of range for a float`);
      }
      return value;
    },
    format: (value) => {
      if (!Number.isFinite(value)) {
        throw new Error(`${value} has no textual form`);
      }
      return String(value);
    },
  },
  decimal: {
    pattern: DECIMAL_PATTERN,
    parse: (text) => {
      if (!DECIMAL_TEXT.test(text)) {
        throw new Error(`"${text}" is not a decimal`);
      }
      return text.startsWith("+") ? text.slice(1) : text;
    },
    format: (value) => {
      if (!DECIMAL_TEXT.test(value)) {
        throw new Error(`"${value}" is not a decimal`);
      }
      return value;
    },
  },
  date: {
    pattern: DATE_PATTERN,
    parse: (text) => {
      const { year, month, day } = parseCalendarDate(text);
      return utcDate(year, month, day);
    },
    format: formatDate,
  },
  datetime: {
    pattern: `${DATE_PATTERN}[ T]${TIME_PATTERN}`,
    parse: (text) => {
      const parts = DATETIME_PARTS.exec(text);
      if (!parts) {
        throw new Error(`"${text}" is not a date-time`);
      }
      const { year, month, day } = parseCalendarDate(parts[1] ?? "");
      const time = parseTimeOfDay(parts[2] ?? "");
      return utcDate(year, month, day, time);
    },
    format: (value) => {
      assertValidDate(value);
      const time = formatTimeOfDay({
        hour: value.getUTCHours(),
        minute: value.getUTCMinutes(),
        second: value.getUTCSeconds(),
        microsecond: value.getUTCMilliseconds() * 1000,
      });
      return `${formatDate(value)} ${time}`;
    },
  },
  time: {
    pattern: TIME_PATTERN,
    parse: parseTimeOfDay,
    format: formatTimeOfDay,
  },
  uuid: {
    pattern: "[0-9a-fA-F]{8}-[0-9a-fA-F]{4}-[0-9a-fA-F]{4}-[0-9a-fA-F]{4}-[0-9a-fA-F]{12}",
    parse: (text) => {
      if (!UUID_TEXT.test(text)) {
        throw new Error(`"${text}" is not a UUID`);
      }
      return text.toLowerCase();
    },
    format: (value) => {
      if (!UUID_TEXT.test(value)) {
        throw new Error(`"${value}" is not a UUID`);
      }
      return value;
    },
  },
  text: {
    pattern: ".+?",
    parse: (text) => text,
    format: (value) => value,
  },
};

export function isPrimitiveKind(value: string): value is PrimitiveKind {
  return Object.hasOwn(CONVERTERS, value);
}

export function parsePrimitive(kind: PrimitiveKind, text: string): PrimitiveValueMap[PrimitiveKind] {
  return CONVERTERS[kind].parse(text);
}

function isTimeOfDay(value: unknown): value is TimeOfDay {
  return (
    typeof value === "object" &&
    value !== null &&
    "hour" in value &&
    "minute" in value &&
    "second" in value &&
    "microsecond" in value &&
    typeof value.hour === "number" &&
    typeof value.minute === "number" &&
    typeof value.second === "number" &&
    typeof value.microsecond === "number"
  );
}

/** Formats a runtime value with the converter of `kind`, checking its shape first. */
export function formatPrimitive(kind: PrimitiveKind, value: unknown): string {
  switch (kind) {
    case "boolean":
      if (typeof value === "boolean") {
        return CONVERTERS.boolean.format(value);
      }
      break;
    case "integer":
    case "float":
      if (typeof value === "number") {
        return CONVERTERS[kind].format(value);
      }
      break;
    case "decimal":
    case "uuid":
    case "text":
      if (typeof value === "string") {
        return CONVERTERS[kind].format(value);
      }
      break;
    case "date":
    case "datetime":
      if (value instanceof Date) {
        return CONVERTERS[kind].format(value);
      }
      break;
    case "time":
      if (isTimeOfDay(value)) {
        return CONVERTERS.time.format(value);
      }
      break;
  }
  throw new Error(`expected a ${kind} value, got ${describeValue(value)}`);
}

function describeValue(value: unknown): string {
  if (value === null) {
    return "null";
  }
  if (value instanceof Date) {
    return "Date";
  }
  return typeof value;
}
