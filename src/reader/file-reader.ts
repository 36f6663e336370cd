/**
 * Rotation-aware file tailing
 */

import * as fs from 'fs';
import { FileHandle } from 'fs/promises';
import { StringDecoder } from 'string_decoder';
import { ReaderOptions } from '../types';
import { lineToRecord } from './normalizer';
import { BaseReader } from './reader';
import { RecordChannel } from './record-channel';

export const DEFAULT_POLL_INTERVAL_MS = 1000;
const READ_CHUNK_SIZE = 64 * 1024;

export interface FileReaderOptions extends ReaderOptions {
  pollIntervalMs?: number;
}

interface FileIdentity {
  dev: number;
  ino: number;
}

/**
 * Follows a file from its first line, surviving rotation and truncation.
 *
 * Every poll compares the open handle with the file currently at the path
 * (device and inode) and with the read position. A different file, or a
 * size below the position, counts as a rotation: the old handle is drained
 * and closed, and reading restarts at offset 0 of the new file.
 */
export class FileReader extends BaseReader {
  readonly type = 'file';
  readonly fileName: string;
  readonly pollIntervalMs: number;

  private handle?: FileHandle;
  private identity?: FileIdentity;
  private position = 0;
  private decoder = new StringDecoder('utf8');
  private partial = '';
  private wake?: () => void;
  private rotations = 0;

  constructor(fileName: string, channel?: RecordChannel<string>, options: FileReaderOptions = {}) {
    super(channel, options);
    this.fileName = fileName;
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
  }

  /** Number of rotations detected so far */
  get rotationCount(): number {
    return this.rotations;
  }

  protected async prepare(): Promise<void> {
    await this.openFile();
    this.log.debug(`Following ${this.fileName} every ${this.pollIntervalMs}ms`);
  }

  protected async produce(): Promise<void> {
    try {
      while (!this.stopped) {
        await this.poll();
        if (this.stopped) {
          break;
        }
        await this.sleep();
      }
    } finally {
      await this.closeHandle();
    }
  }

  protected onClose(): void {
    this.wake?.();
  }

  /**
   * One polling tick: detect rotation, then deliver everything appended
   */
  private async poll(): Promise<void> {
    if (await this.detectRotation()) {
      await this.rotate();
    }
    await this.readAvailable();
  }

  private async detectRotation(): Promise<boolean> {
    if (!this.handle || !this.identity) {
      return false;
    }

    let current: fs.Stats;
    try {
      current = await fs.promises.stat(this.fileName);
    } catch (error) {
      if (isMissingFile(error)) {
        // Rotator has moved the file away and not yet created the new one
        this.log.trace(`${this.fileName} is missing, waiting for it to reappear`);
        return false;
      }
      throw error;
    }

    if (current.dev !== this.identity.dev || current.ino !== this.identity.ino) {
      this.log.debug(`${this.fileName} was replaced by a new file`);
      return true;
    }

    const opened = await this.handle.stat();
    if (opened.size < this.position) {
      this.log.debug(`${this.fileName} was truncated (${opened.size} < ${this.position})`);
      return true;
    }

    return false;
  }

  private async rotate(): Promise<void> {
    // Lines appended to the old file before the switch are still delivered
    await this.readAvailable();
    await this.flushPartial();
    await this.closeHandle();
    await this.openFile();
    this.rotations += 1;
  }

  private async openFile(): Promise<void> {
    const handle = await fs.promises.open(this.fileName, 'r');
    const stats = await handle.stat();
    this.handle = handle;
    this.identity = { dev: stats.dev, ino: stats.ino };
    this.position = 0;
    this.decoder = new StringDecoder('utf8');
    this.partial = '';
  }

  private async closeHandle(): Promise<void> {
    const handle = this.handle;
    this.handle = undefined;
    if (handle) {
      await handle.close();
    }
  }

  private async readAvailable(): Promise<void> {
    const buffer = Buffer.alloc(READ_CHUNK_SIZE);
    while (this.handle && !this.stopped) {
      const { bytesRead } = await this.handle.read(buffer, 0, buffer.length, this.position);
      if (bytesRead === 0) {
        return;
      }
      this.position += bytesRead;
      await this.emitText(this.decoder.write(buffer.subarray(0, bytesRead)));
    }
  }

  private async emitText(text: string): Promise<void> {
    const lines = (this.partial + text).split('\n');
    this.partial = lines.pop() ?? '';
    for (const line of lines) {
      if (!(await this.emitLine(line))) {
        return;
      }
    }
  }

  private async flushPartial(): Promise<void> {
    const rest = this.partial + this.decoder.end();
    this.partial = '';
    if (rest.length > 0) {
      await this.emitLine(rest);
    }
  }

  private async emitLine(line: string): Promise<boolean> {
    const record = lineToRecord(line.endsWith('\r') ? line.slice(0, -1) : line);
    if (record === undefined) {
      return !this.stopped;
    }
    return this.emit(record);
  }

  private sleep(): Promise<void> {
    return new Promise(resolve => {
      const timer = setTimeout(() => {
        this.wake = undefined;
        resolve();
      }, this.pollIntervalMs);
      this.wake = () => {
        clearTimeout(timer);
        this.wake = undefined;
        resolve();
      };
    });
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
