/** Structured event logger: JSON lines on stderr, batched delivery to a sink */

import { ulid } from 'ulid';
import type {
  Environment,
  EnvironmentConfig,
  LogEntry,
  Logger,
  LoggerConfig,
  LogLevel,
  LogSink,
} from './types.js';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'fatal'];

const ENVIRONMENT_CONFIGS: Record<Environment, EnvironmentConfig> = {
  test: { minLevel: 'debug', includeStackTraces: true, bufferSize: 1000 },
  development: { minLevel: 'info', includeStackTraces: true, bufferSize: 50 },
  // CLI default: stderr stays quiet unless something goes wrong
  production: { minLevel: 'warn', includeStackTraces: false, bufferSize: 50 },
};

function rank(level: LogLevel): number {
  return LOG_LEVELS.indexOf(level);
}

/**
 * Level filter, pending batch and sink shared by a root logger and its children
 */
class LogPipeline {
  private pending: LogEntry[] = [];

  constructor(
    private readonly settings: EnvironmentConfig,
    private readonly sink: LogSink | undefined,
    private readonly batchSize: number,
  ) {}

  accepts(level: LogLevel): boolean {
    return rank(level) >= rank(this.settings.minLevel);
  }

  /** Errors become plain objects; stacks survive only where the environment keeps them */
  serialize(metadata: Record<string, unknown>): Record<string, unknown> {
    return Object.fromEntries(
      Object.entries(metadata).map(([key, value]): [string, unknown] => {
        if (!(value instanceof Error)) return [key, value];
        const stack = this.settings.includeStackTraces ? value.stack : undefined;
        return [key, { name: value.name, message: value.message, ...(stack ? { stack } : {}) }];
      }),
    );
  }

  enqueue(entry: LogEntry): void {
    // Debug entries are console-only
    if (!this.sink || entry.level === 'debug') return;

    this.pending.push(entry);
    if (entry.level === 'fatal' || this.pending.length >= this.batchSize) {
      // drain() reports sink failures itself and never rejects
      void this.drain();
    }
  }

  async drain(): Promise<void> {
    if (!this.sink || this.pending.length === 0) return;

    const batch = this.pending;
    this.pending = [];
    try {
      await this.sink.write(batch);
    } catch (err) {
      console.error('Failed to flush logs to sink:', err, { entries: batch.length });
    }
  }
}

class EventLogger implements Logger {
  constructor(
    private readonly pipeline: LogPipeline,
    private readonly context: Record<string, unknown>,
  ) {}

  child(metadata: Record<string, unknown>): Logger {
    return new EventLogger(this.pipeline, { ...this.context, ...metadata });
  }

  debug(event_type: string, metadata?: Record<string, unknown>): void {
    this.emit('debug', event_type, metadata);
  }

  info(event_type: string, metadata?: Record<string, unknown>): void {
    this.emit('info', event_type, metadata);
  }

  warn(event_type: string, metadata?: Record<string, unknown>): void {
    this.emit('warn', event_type, metadata);
  }

  error(event_type: string, metadata?: Record<string, unknown>): void {
    this.emit('error', event_type, metadata);
  }

  fatal(event_type: string, metadata?: Record<string, unknown>): void {
    this.emit('fatal', event_type, metadata);
  }

  flush(): Promise<void> {
    return this.pipeline.drain();
  }

  private emit(level: LogLevel, event_type: string, metadata: Record<string, unknown> = {}): void {
    if (!this.pipeline.accepts(level)) return;

    const entry: LogEntry = {
      id: ulid(),
      level,
      event_type,
      metadata: this.pipeline.serialize({ ...this.context, ...metadata }),
      timestamp: Date.now(),
    };

    // stderr keeps stdout free for program output
    console.error(
      JSON.stringify({
        level,
        event_type,
        metadata: entry.metadata,
        timestamp: new Date(entry.timestamp).toISOString(),
      }),
    );
    this.pipeline.enqueue(entry);
  }
}

/**
 * Create a root logger
 *
 * @throws Error when neither a sink nor `consoleOnly` is given
 */
export function createLogger(config: LoggerConfig): Logger {
  const consoleOnly = config.consoleOnly ?? false;
  if (!consoleOnly && !config.sink) {
    throw new Error('LoggerConfig.sink is required when consoleOnly is false');
  }

  const settings = ENVIRONMENT_CONFIGS[config.environment ?? 'development'];
  const pipeline = new LogPipeline(
    settings,
    consoleOnly ? undefined : config.sink,
    config.bufferSize ?? settings.bufferSize,
  );
  return new EventLogger(pipeline, {});
}
