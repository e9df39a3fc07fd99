import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { appendFile, mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import { Observable, Subject } from 'rxjs';
import { filter } from 'rxjs/operators';
import type { DeployLogEvent, DeployLogLevel, DeployLogSink } from './deploy-log.types';

export function formatLogLine(event: DeployLogEvent): string {
  return `[${event.timestamp}] ${event.level.toUpperCase()}: ${event.message}\n`;
}

/**
 * Append-only log file. Lines are written in the order they were logged;
 * the first write creates missing parent directories.
 */
class FileLogSink implements DeployLogSink {
  private pending: Promise<void> = Promise.resolve();
  private directoryReady = false;

  constructor(
    private readonly destination: string,
    private readonly events: Subject<DeployLogEvent>,
    private readonly logger: Logger,
    private readonly now: () => Date,
  ) {}

  log(level: DeployLogLevel, message: string): void {
    const event: DeployLogEvent = {
      destination: this.destination,
      level,
      message,
      timestamp: this.now().toISOString(),
    };

    if (level === 'error') this.logger.error(message);
    else if (level === 'warn') this.logger.warn(message);
    else this.logger.log(message);

    this.events.next(event);
    this.pending = this.pending
      .then(() => this.write(formatLogLine(event)))
      .catch((err: unknown) => {
        const reason = err instanceof Error ? err.message : String(err);
        this.logger.error(`Failed to write ${this.destination}: ${reason}`);
      });
  }

  flush(): Promise<void> {
    return this.pending;
  }

  private async write(line: string): Promise<void> {
    if (!this.directoryReady) {
      await mkdir(dirname(this.destination), { recursive: true });
      this.directoryReady = true;
    }
    await appendFile(this.destination, line, 'utf8');
  }
}

/**
 * Deploy log: every line goes to its log file, the Nest logger, and the
 * in-process event stream that /stream/logs serves.
 */
@Injectable()
export class DeployLogService implements OnModuleDestroy {
  private readonly logger = new Logger('Deployer');
  private readonly sinks = new Map<string, FileLogSink>();
  private readonly logSubject = new Subject<DeployLogEvent>();

  /** Clock used for line timestamps; replaced in tests. */
  now: () => Date = () => new Date();

  forDestination(path: string): DeployLogSink {
    let sink = this.sinks.get(path);
    if (!sink) {
      sink = new FileLogSink(path, this.logSubject, this.logger, () => this.now());
      this.sinks.set(path, sink);
    }
    return sink;
  }

  getLogStream(): Observable<DeployLogEvent> {
    return this.logSubject.asObservable();
  }

  getLogStreamForDestination(destination: string): Observable<DeployLogEvent> {
    return this.logSubject.pipe(filter((ev) => ev.destination === destination));
  }

  async onModuleDestroy(): Promise<void> {
    await Promise.all([...this.sinks.values()].map((sink) => sink.flush()));
    this.logSubject.complete();
  }
}
