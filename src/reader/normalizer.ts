/**
 * Normalization of raw log entries into canonical JSON records.
 *
 * Every record leaving a reader is a JSON object with at least `severity`
 * and `timestamp`. Cloud Logging entries additionally carry exactly one of
 * `jsonPayload` or `textPayload`.
 */

import { formatRFC3339 } from 'date-fns';

/**
 * Protobuf `google.protobuf.Value`, as decoded by the logging client
 */
export interface StructValue {
  nullValue?: unknown;
  numberValue?: number | null;
  stringValue?: string | null;
  boolValue?: boolean | null;
  structValue?: StructObject | null;
  listValue?: { values?: StructValue[] | null } | null;
  kind?: string | null;
}

/**
 * Protobuf `google.protobuf.Struct`
 */
export interface StructObject {
  fields?: { [key: string]: StructValue } | null;
}

export interface EntryTimestamp {
  seconds?: unknown;
  nanos?: number | null;
}

/**
 * The subset of a Cloud Logging `LogEntry` the normalizer reads.
 * Everything else on the entry is ignored.
 */
export interface RawLogEntry {
  logName?: string | null;
  resource?: unknown;
  timestamp?: EntryTimestamp | null;
  receiveTimestamp?: unknown;
  severity?: number | string | null;
  insertId?: string | null;
  httpRequest?: unknown;
  labels?: { [key: string]: string } | null;
  operation?: unknown;
  trace?: string | null;
  spanId?: string | null;
  traceSampled?: boolean | null;
  sourceLocation?: unknown;
  textPayload?: string | null;
  jsonPayload?: StructObject | null;
  protoPayload?: unknown;
}

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

export type EntryPayload =
  | { kind: 'json'; value: JsonObject }
  | { kind: 'text'; value: string }
  | { kind: 'none' };

/**
 * A raw entry split into the parts the canonical record is built from
 */
export interface ClassifiedEntry {
  severity: string;
  /** Entry time, undefined when the entry carries none or it is malformed */
  time?: { date: Date; nanos: number };
  payload: EntryPayload;
  /** Passthrough fields copied to the record as they are */
  rest: JsonObject;
}

export interface NormalizedEntry {
  /** JSON-encoded canonical record */
  record: string;
  /** Entry time as local RFC3339 with nanoseconds, used to resume queries */
  watermark?: string;
}

// google.logging.type.LogSeverity
const SEVERITY_NAMES: Record<number, string> = {
  0: 'DEFAULT',
  100: 'DEBUG',
  200: 'INFO',
  300: 'NOTICE',
  400: 'WARNING',
  500: 'ERROR',
  600: 'CRITICAL',
  700: 'ALERT',
  800: 'EMERGENCY',
};

const KNOWN_SEVERITIES = new Set(Object.values(SEVERITY_NAMES));

const PASSTHROUGH_FIELDS = [
  'logName',
  'resource',
  'insertId',
  'httpRequest',
  'labels',
  'operation',
  'trace',
  'spanId',
  'traceSampled',
  'sourceLocation',
] as const;

export function severityName(severity: RawLogEntry['severity']): string {
  if (typeof severity === 'number') {
    return SEVERITY_NAMES[severity] ?? 'DEFAULT';
  }
  if (typeof severity === 'string' && KNOWN_SEVERITIES.has(severity)) {
    return severity;
  }
  return 'DEFAULT';
}

/**
 * Converts a protobuf Value into plain JSON
 */
export function structValueToJson(value: StructValue | null | undefined): JsonValue {
  if (!value) {
    return null;
  }
  if (value.structValue) {
    return structToJson(value.structValue);
  }
  if (value.listValue) {
    return (value.listValue.values ?? []).map(item => structValueToJson(item));
  }
  if (typeof value.stringValue === 'string') {
    return value.stringValue;
  }
  if (typeof value.numberValue === 'number') {
    return value.numberValue;
  }
  if (typeof value.boolValue === 'boolean') {
    return value.boolValue;
  }
  return null;
}

/**
 * Converts a protobuf Struct into a plain JSON object
 */
export function structToJson(struct: StructObject | null | undefined): JsonObject {
  const result: JsonObject = {};
  for (const [key, value] of Object.entries(struct?.fields ?? {})) {
    result[key] = structValueToJson(value);
  }
  return result;
}

function toSeconds(value: unknown): number | undefined {
  if (typeof value === 'number') {
    return value;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  // Long from protobufjs
  if (value !== null && typeof value === 'object' && 'toNumber' in value) {
    const { toNumber } = value;
    if (typeof toNumber === 'function') {
      const parsed: unknown = toNumber.call(value);
      return typeof parsed === 'number' ? parsed : undefined;
    }
  }
  return undefined;
}

function readTime(timestamp: RawLogEntry['timestamp']): ClassifiedEntry['time'] {
  if (!timestamp) {
    return undefined;
  }
  const seconds = toSeconds(timestamp.seconds);
  if (seconds === undefined) {
    return undefined;
  }
  const nanos = typeof timestamp.nanos === 'number' ? timestamp.nanos : 0;
  const date = new Date(seconds * 1000 + Math.floor(nanos / 1e6));
  if (Number.isNaN(date.getTime())) {
    return undefined;
  }
  return { date, nanos };
}

function classifyPayload(entry: RawLogEntry): EntryPayload {
  if (entry.jsonPayload) {
    return { kind: 'json', value: structToJson(entry.jsonPayload) };
  }
  if (typeof entry.textPayload === 'string' && entry.textPayload.length > 0) {
    return { kind: 'text', value: entry.textPayload };
  }
  return { kind: 'none' };
}

function toJsonValue(value: unknown): JsonValue | undefined {
  if (value === undefined) {
    return undefined;
  }
  try {
    const encoded = JSON.stringify(value);
    if (encoded === undefined) {
      return undefined;
    }
    const decoded: JsonValue = JSON.parse(encoded);
    return decoded;
  } catch {
    // Unserializable field (cycle, BigInt); leave it out
    return undefined;
  }
}

/**
 * Splits a raw entry into severity, time, payload and passthrough fields
 */
export function classifyEntry(entry: RawLogEntry): ClassifiedEntry {
  const rest: JsonObject = {};
  for (const field of PASSTHROUGH_FIELDS) {
    const value = toJsonValue(entry[field]);
    if (value !== undefined && value !== null) {
      rest[field] = value;
    }
  }

  return {
    severity: severityName(entry.severity),
    time: readTime(entry.timestamp),
    payload: classifyPayload(entry),
    rest,
  };
}

/**
 * Formats an instant as local RFC3339 with a nanosecond fraction
 */
export function formatWatermark(date: Date, nanos: number): string {
  const base = formatRFC3339(date);
  const fraction = String(Math.max(0, Math.min(999_999_999, Math.trunc(nanos)))).padStart(9, '0');
  // base is "YYYY-MM-DDTHH:mm:ss" followed by "Z" or "+hh:mm"
  return `${base.slice(0, 19)}.${fraction}${base.slice(19)}`;
}

/**
 * Turns one Cloud Logging entry into a canonical record.
 *
 * Never throws: missing fields fall back to defaults, and an entry without a
 * usable timestamp gets the current time and no watermark.
 */
export function normalizeEntry(entry: RawLogEntry, now: Date = new Date()): NormalizedEntry {
  const classified = classifyEntry(entry);
  const record: JsonObject = {
    ...classified.rest,
    severity: classified.severity,
    timestamp: formatRFC3339(classified.time?.date ?? now),
  };

  if (classified.payload.kind === 'json') {
    record.jsonPayload = classified.payload.value;
  } else if (classified.payload.kind === 'text') {
    record.textPayload = classified.payload.value;
  }

  return {
    record: JSON.stringify(record),
    watermark: classified.time ? formatWatermark(classified.time.date, classified.time.nanos) : undefined,
  };
}

function isJsonObject(value: JsonValue): value is JsonObject {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Turns one line of file or stdin input into a record.
 *
 * JSON object lines keep their fields, gaining `severity` and `timestamp`
 * only where missing. Other lines are wrapped as `textPayload`.
 *
 * @returns undefined for blank lines
 */
export function lineToRecord(line: string, now: Date = new Date()): string | undefined {
  if (line.trim() === '') {
    return undefined;
  }

  let parsed: JsonValue | undefined;
  try {
    parsed = JSON.parse(line);
  } catch {
    parsed = undefined;
  }

  if (parsed !== undefined && isJsonObject(parsed)) {
    if ('severity' in parsed && 'timestamp' in parsed) {
      return line;
    }
    return JSON.stringify({
      severity: 'DEFAULT',
      timestamp: formatRFC3339(now),
      ...parsed,
    });
  }

  return JSON.stringify({
    severity: 'DEFAULT',
    timestamp: formatRFC3339(now),
    textPayload: line,
  });
}
