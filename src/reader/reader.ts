/**
 * Common contract for every log source
 */

import { ConfigurationError, TransportError, toTransportError } from '../errors';
import { Logger, logger } from '../logger';
import { ErrorCallback, ReaderOptions, ReaderType } from '../types';
import { RecordChannel } from './record-channel';

/**
 * Outcome of a reader's producer task
 */
export type StreamResult = { ok: true } | { ok: false; error: TransportError };

export interface Reader {
  readonly type: ReaderType;
  /** Records produced by this reader, one JSON document per value */
  readonly channel: RecordChannel<string>;
  /** Settles once the producer has stopped, never rejects */
  readonly done: Promise<StreamResult>;
  /**
   * Validates the source and starts producing in the background.
   * Rejects only for setup failures; later failures go to `onError` and `done`.
   */
  streamInto(): Promise<void>;
  /** Stops the producer and closes the channel */
  close(): void;
}

/**
 * State and lifecycle shared by the file, stdin and Cloud Logging readers.
 *
 * Subclasses implement `prepare` (synchronous setup, may reject) and
 * `produce` (the background loop). The producer must check `stopped` at
 * every loop boundary and send through `emit`.
 */
export abstract class BaseReader implements Reader {
  abstract readonly type: ReaderType;
  readonly channel: RecordChannel<string>;
  readonly done: Promise<StreamResult>;

  private readonly onError?: ErrorCallback;
  private resolveDone: (result: StreamResult) => void = () => undefined;
  private started = false;
  private isStopped = false;
  private closeRequested = false;
  private scopedLogger?: Logger;

  constructor(channel: RecordChannel<string> | undefined, options: ReaderOptions = {}) {
    this.channel = channel ?? new RecordChannel<string>(options.capacity ?? 1);
    this.onError = options.onError;
    this.done = new Promise<StreamResult>(resolve => {
      this.resolveDone = resolve;
    });
  }

  /** Logger tagged with this reader's type */
  protected get log(): Logger {
    if (!this.scopedLogger) {
      this.scopedLogger = logger.child(this.type);
    }
    return this.scopedLogger;
  }

  get stopped(): boolean {
    return this.isStopped || this.channel.closed;
  }

  async streamInto(): Promise<void> {
    if (this.started) {
      throw new ConfigurationError(`${this.type} reader has already been started`);
    }
    this.started = true;
    if (this.closeRequested) {
      this.resolveDone({ ok: true });
      return;
    }

    try {
      await this.prepare();
    } catch (error) {
      this.resolveDone({ ok: false, error: toTransportError(error) });
      throw error;
    }

    void this.supervise();
  }

  close(): void {
    if (this.isStopped) {
      return;
    }
    this.log.debug('Closing reader');
    this.isStopped = true;
    this.closeRequested = true;
    this.channel.close();
    this.onClose();
    if (!this.started) {
      this.resolveDone({ ok: true });
    }
  }

  /**
   * Sends a record unless the reader has been stopped.
   * The stop check and the send happen in the same tick, so nothing is
   * delivered once close() has run.
   *
   * @returns false when the record was not delivered because the reader stopped
   */
  protected emit(record: string): Promise<boolean> {
    if (this.stopped) {
      return Promise.resolve(false);
    }
    return this.channel.send(record);
  }

  /** Setup run by streamInto before it returns */
  protected abstract prepare(): Promise<void>;

  /** Background production loop */
  protected abstract produce(): Promise<void>;

  /** Releases source handles when close() is called */
  protected onClose(): void {
    // Nothing to release by default
  }

  /**
   * Runs the producer, turning any fault into a TransportError reported once.
   * Ends the record stream when the source is exhausted.
   */
  private async supervise(): Promise<void> {
    let result: StreamResult;
    try {
      await this.produce();
      result = { ok: true };
    } catch (error) {
      if (this.closeRequested) {
        // Handles torn down by close() make the producer fail; that is a normal stop
        this.log.debug(`Stopped: ${toTransportError(error).message}`);
        result = { ok: true };
      } else {
        const failure = toTransportError(error);
        this.log.debug(`Failed: ${failure.message}`);
        result = { ok: false, error: failure };
      }
    }

    // Source exhausted: close so the consumer's loop ends
    this.isStopped = true;
    this.channel.close();

    if (!result.ok && this.onError) {
      try {
        this.onError(result.error);
      } catch (callbackError) {
        this.log.warn('Error callback threw:', callbackError);
      }
    }
    this.resolveDone(result);
  }
}
