/**
 * Cloud Logging reader: historical query, then live tail
 */

import {
  HISTORICAL_PAGE_SIZE,
  LoggingBackend,
  LoggingBackendFactory,
  TailSession,
  createGcpBackend,
  projectResource,
} from '../gcp/logging-backend';
import { ReaderOptions, TimeRange } from '../types';
import { normalizeEntry } from './normalizer';
import { BaseReader } from './reader';
import { RecordChannel } from './record-channel';

export type GcpReaderMode = 'idle' | 'historical' | 'tail';

export interface GcpReaderOptions extends ReaderOptions {
  /** Creates the backend when the reader starts. Default: the Cloud Logging gRPC client */
  backendFactory?: LoggingBackendFactory;
  /** Called on every mode switch */
  onModeChange?: (mode: GcpReaderMode) => void;
}

export interface GcpStreamSettings {
  projectId: string;
  filter?: string;
  timeRange: TimeRange;
}

const WATERMARK_PATTERN = /^(\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2})(?:\.(\d{1,9}))?(Z|[+-]\d{2}:\d{2})$/;

/**
 * Splits an RFC3339 timestamp into epoch milliseconds (whole seconds) and nanoseconds
 */
function instantOf(watermark: string): [number, number] | undefined {
  const match = WATERMARK_PATTERN.exec(watermark);
  if (!match) {
    return undefined;
  }
  const seconds = Date.parse(`${match[1]}${match[3]}`);
  if (Number.isNaN(seconds)) {
    return undefined;
  }
  const nanos = Number.parseInt((match[2] ?? '').padEnd(9, '0'), 10);
  return [seconds, nanos];
}

/**
 * Returns the later of two watermarks; an unreadable candidate never wins
 */
export function advanceWatermark(current: string, candidate: string): string {
  const next = instantOf(candidate);
  if (!next) {
    return current;
  }
  const previous = instantOf(current);
  if (!previous) {
    return candidate;
  }
  if (next[0] > previous[0] || (next[0] === previous[0] && next[1] > previous[1])) {
    return candidate;
  }
  return current;
}

/**
 * Builds the Cloud Logging filter selecting entries after the watermark
 */
export function buildHistoricalFilter(watermark: string, filter?: string): string {
  const timeFilter = `timestamp > "${watermark}"`;
  return filter ? `${timeFilter} AND (${filter})` : timeFilter;
}

/**
 * Streams a project's entries into the channel.
 *
 * With a resume point, pages through entries newer than the watermark,
 * advancing it with every delivered entry. When a pass builds the same
 * filter as the previous one nothing new has arrived, and the reader moves
 * to tail mode for good: one live session, entries delivered batch by batch
 * until the server ends the stream.
 */
export class GcpReader extends BaseReader {
  readonly type = 'gcp';
  readonly projectId: string;
  readonly filter?: string;
  readonly timeRange: TimeRange;

  private readonly backendFactory: LoggingBackendFactory;
  private readonly onModeChange?: (mode: GcpReaderMode) => void;
  private backend?: LoggingBackend;
  private session?: TailSession;
  private currentMode: GcpReaderMode = 'idle';
  private currentWatermark?: string;

  constructor(settings: GcpStreamSettings, channel?: RecordChannel<string>, options: GcpReaderOptions = {}) {
    super(channel, options);
    this.projectId = settings.projectId;
    this.filter = settings.filter?.trim() || undefined;
    this.timeRange = settings.timeRange;
    this.backendFactory = options.backendFactory ?? (() => createGcpBackend());
    this.onModeChange = options.onModeChange;
    if (settings.timeRange.mode === 'from') {
      this.currentWatermark = settings.timeRange.watermark;
    }
  }

  get mode(): GcpReaderMode {
    return this.currentMode;
  }

  /** Time of the latest delivered historical entry, or the resume point */
  get watermark(): string | undefined {
    return this.currentWatermark;
  }

  protected async prepare(): Promise<void> {
    this.backend = await this.backendFactory();
  }

  protected async produce(): Promise<void> {
    const backend = this.backend;
    if (!backend) {
      return;
    }

    try {
      if (this.currentWatermark !== undefined) {
        await this.streamHistory(backend, this.currentWatermark);
      }
      if (!this.stopped) {
        await this.streamTail(backend);
      }
    } finally {
      this.backend = undefined;
      await backend.close();
    }
  }

  protected onClose(): void {
    this.session?.cancel();
  }

  private setMode(mode: GcpReaderMode): void {
    if (this.currentMode === mode) {
      return;
    }
    this.log.debug(`Project ${this.projectId} entering ${mode} mode`);
    this.currentMode = mode;
    this.onModeChange?.(mode);
  }

  private async streamHistory(backend: LoggingBackend, from: string): Promise<void> {
    this.setMode('historical');
    let watermark = from;
    let lastTimeFilter = '';

    while (!this.stopped) {
      const timeFilter = buildHistoricalFilter(watermark);
      if (timeFilter === lastTimeFilter) {
        this.log.debug(`No entries after ${watermark}, switching to tail`);
        return;
      }
      lastTimeFilter = timeFilter;

      const filter = buildHistoricalFilter(watermark, this.filter);
      this.log.trace(`Querying entries with filter: ${filter}`);
      const entries = backend.listEntries({
        resourceNames: [projectResource(this.projectId)],
        filter,
        pageSize: HISTORICAL_PAGE_SIZE,
        orderBy: 'timestamp asc',
      });

      for await (const entry of entries) {
        if (this.stopped) {
          return;
        }
        const normalized = normalizeEntry(entry);
        if (!(await this.emit(normalized.record))) {
          return;
        }
        if (normalized.watermark !== undefined) {
          watermark = advanceWatermark(watermark, normalized.watermark);
          this.currentWatermark = watermark;
        }
      }
    }
  }

  private async streamTail(backend: LoggingBackend): Promise<void> {
    this.setMode('tail');
    const session = backend.tailEntries();
    this.session = session;

    try {
      await session.send({
        resourceNames: [projectResource(this.projectId)],
        filter: this.filter,
      });

      for await (const batch of session) {
        for (const entry of batch) {
          if (this.stopped) {
            return;
          }
          if (!(await this.emit(normalizeEntry(entry).record))) {
            return;
          }
        }
        if (this.stopped) {
          return;
        }
      }
      this.log.debug(`Tail session for ${this.projectId} ended`);
    } finally {
      this.session = undefined;
      session.end();
    }
  }
}
