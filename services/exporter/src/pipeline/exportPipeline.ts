import type { Logger } from 'pino';
import type { Authenticator, Credentials } from './authenticator.js';
import type { AuditEventSource } from './fetcher.js';
import { processRawCsv, writeRawCsv } from './writer.js';
import {
  AuthenticationError,
  ExportJobError,
  FetchError,
  WriteError,
  errorMessage,
} from '../lib/errors.js';
import { trailingWindow, type ExportWindow } from '../lib/exportWindow.js';
import type { CsvTransform } from '../lib/transforms.js';

/**
 * start → authenticated → fetched → raw_written → processed → done.
 * Any stage failure moves to `failed`, which is terminal.
 */
export type PipelineState =
  | 'start'
  | 'authenticated'
  | 'fetched'
  | 'raw_written'
  | 'processed'
  | 'done'
  | 'failed';

export interface ExportPipelineOptions {
  credentials: Credentials;
  exportDir: string;
  windowDays: number;
  separatorHint: boolean;
  transform: CsvTransform;
  now?: () => Date;
}

export interface ExportResult {
  runDate: Date;
  window: ExportWindow;
  eventCount: number;
  rawFile: string;
  processedFile: string;
  processedRowCount: number;
}

export type AuditEventSourceFactory<TSession> = (session: TSession) => AuditEventSource;

export class ExportPipeline<TSession> {
  private currentState: PipelineState = 'start';

  constructor(
    private readonly authenticator: Authenticator<TSession>,
    private readonly createSource: AuditEventSourceFactory<TSession>,
    private readonly options: ExportPipelineOptions,
    private readonly logger: Logger
  ) {}

  get state(): PipelineState {
    return this.currentState;
  }

  async run(): Promise<ExportResult> {
    if (this.currentState !== 'start') {
      throw new Error(`Export pipeline already ran (state: ${this.currentState})`);
    }

    const runDate = (this.options.now ?? (() => new Date()))();
    const window = trailingWindow(runDate, this.options.windowDays);

    try {
      const session = await this.step(
        'authenticated',
        (error) => new AuthenticationError(errorMessage(error), { cause: error }),
        () => this.authenticator.authenticate(this.options.credentials)
      );

      const batch = await this.step(
        'fetched',
        (error) => new FetchError(errorMessage(error), { cause: error }),
        () => this.createSource(session).fetchEvents(window)
      );

      const rawFile = await this.step(
        'raw_written',
        (error) => new WriteError(this.options.exportDir, errorMessage(error), { cause: error }),
        () =>
          writeRawCsv(batch, {
            exportDir: this.options.exportDir,
            date: runDate,
            separatorHint: this.options.separatorHint,
          })
      );
      this.logger.info({ file: rawFile, eventCount: batch.length }, `Audit logs exported to: ${rawFile}`);

      const processed = await this.step(
        'processed',
        (error) => new WriteError(rawFile, errorMessage(error), { cause: error }),
        () => processRawCsv(rawFile, this.options.transform)
      );
      this.logger.info(
        { file: processed.path, transform: this.options.transform.name, rowCount: processed.rowCount },
        `Processed audit logs saved to: ${processed.path}`
      );

      this.transition('done');

      return {
        runDate,
        window,
        eventCount: batch.length,
        rawFile,
        processedFile: processed.path,
        processedRowCount: processed.rowCount,
      };
    } catch (error: unknown) {
      this.transition('failed');
      throw error;
    }
  }

  private async step<T>(
    next: PipelineState,
    wrap: (error: unknown) => ExportJobError,
    action: () => Promise<T>
  ): Promise<T> {
    let result: T;
    try {
      result = await action();
    } catch (error: unknown) {
      throw error instanceof ExportJobError ? error : wrap(error);
    }
    this.transition(next);
    return result;
  }

  private transition(next: PipelineState): void {
    this.logger.debug({ from: this.currentState, to: next }, 'Export pipeline state changed');
    this.currentState = next;
  }
}
