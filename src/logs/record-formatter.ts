/**
 * Formats records for stdout (raw, pretty, json)
 */

import chalk from 'chalk';
import { OutputFormat } from '../types';

export interface RecordFormatterOptions {
  format: OutputFormat;
  /** Whether to colorize pretty output. Defaults to true if stdout is TTY */
  colorize?: boolean;
}

type RecordFields = { [key: string]: unknown };

function parseRecord(record: string): RecordFields | undefined {
  try {
    const parsed: unknown = JSON.parse(record);
    if (parsed !== null && typeof parsed === 'object' && !Array.isArray(parsed)) {
      return { ...parsed };
    }
    return undefined;
  } catch {
    return undefined;
  }
}

/**
 * Formats records produced by the readers
 */
export class RecordFormatter {
  private format: OutputFormat;
  private colorize: boolean;

  constructor(options: RecordFormatterOptions) {
    this.format = options.format;
    this.colorize = options.colorize ?? process.stdout.isTTY ?? false;
  }

  /**
   * Formats one record
   *
   * @returns Formatted text ending in a newline
   */
  formatRecord(record: string): string {
    switch (this.format) {
      case 'raw':
        return this.formatRaw(record);
      case 'json':
        return this.formatJson(record);
      case 'pretty':
        return this.formatPretty(record);
    }
  }

  formatRaw(record: string): string {
    return record.endsWith('\n') ? record : record + '\n';
  }

  /**
   * Re-serializes the record compactly; records that are not JSON pass through
   */
  private formatJson(record: string): string {
    const fields = parseRecord(record);
    return fields ? JSON.stringify(fields) + '\n' : this.formatRaw(record);
  }

  /**
   * `[timestamp] SEVERITY message`, coloured by severity
   */
  private formatPretty(record: string): string {
    const fields = parseRecord(record);
    if (!fields) {
      return this.formatRaw(record);
    }

    const timestamp = typeof fields.timestamp === 'string' ? fields.timestamp : '-';
    const severity = typeof fields.severity === 'string' ? fields.severity : 'DEFAULT';
    const line = `[${timestamp}] ${severity.padEnd(9)} ${messageOf(fields)}`;

    if (!this.colorize) {
      return line + '\n';
    }
    return colorForSeverity(severity)(line) + '\n';
  }
}

/**
 * Text shown for a record in pretty output
 */
export function messageOf(fields: RecordFields): string {
  if (typeof fields.textPayload === 'string') {
    return fields.textPayload;
  }

  const payload = fields.jsonPayload;
  if (payload !== null && typeof payload === 'object' && !Array.isArray(payload)) {
    const message: unknown = 'message' in payload ? payload.message : undefined;
    if (typeof message === 'string') {
      return message;
    }
    return JSON.stringify(payload);
  }

  if (typeof fields.message === 'string') {
    return fields.message;
  }
  if (typeof fields.msg === 'string') {
    return fields.msg;
  }

  const rest = { ...fields };
  delete rest.timestamp;
  delete rest.severity;
  return JSON.stringify(rest);
}

function colorForSeverity(severity: string): (text: string) => string {
  switch (severity) {
    case 'DEBUG':
      return chalk.gray;
    case 'INFO':
    case 'NOTICE':
      return chalk.blue;
    case 'WARNING':
      return chalk.yellow;
    case 'ERROR':
    case 'CRITICAL':
    case 'ALERT':
    case 'EMERGENCY':
      return chalk.red;
    default:
      return (text: string) => text;
  }
}
