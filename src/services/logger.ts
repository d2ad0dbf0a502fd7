import type { Disposable } from 'vscode-languageserver-protocol';
import { ILogger } from '../context/contracts';

export enum LogLevel {
  Info = 'info',
  Warn = 'warn',
  Error = 'error',
}

/**
 * Line sink the logger writes to
 */
export interface OutputChannel extends Disposable {
  appendLine(line: string): void;
}

/**
 * Output channel over a writable stream, `process.stderr` by default
 */
export class StreamOutputChannel implements OutputChannel {
  constructor(private readonly stream: NodeJS.WritableStream = process.stderr) {}

  appendLine(line: string): void {
    this.stream.write(`${line}\n`);
  }

  dispose(): void {
    // The stream belongs to the caller
  }
}

/**
 * Unified logger for the coordinator. All components should use this single channel.
 */
export class Logger implements ILogger {
  private static instance: Logger | undefined;
  private readonly channel: OutputChannel;

  constructor(channel?: OutputChannel) {
    // Reuse existing channel if singleton already exists
    if (channel) {
      this.channel = channel;
    } else if (Logger.instance) {
      this.channel = Logger.instance.channel;
    } else {
      this.channel = new StreamOutputChannel();
    }
    if (!Logger.instance) {
      Logger.instance = this;
    }
  }

  /**
   * Get the singleton Logger instance. Creates one if it doesn't exist.
   */
  static getInstance(): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger();
    }
    return Logger.instance;
  }

  info(message: string): void {
    this.write(LogLevel.Info, message);
  }

  warn(message: string): void {
    this.write(LogLevel.Warn, message);
  }

  error(message: string, err?: unknown): void {
    const suffix = err instanceof Error ? ` :: ${err.stack ?? err.message}` : err ? ` :: ${String(err)}` : '';
    this.write(LogLevel.Error, message + suffix);
  }

  private write(level: LogLevel, text: string): void {
    const ts = new Date().toISOString();
    this.channel.appendLine(`[${ts}] [${level}] ${text}`);
  }

  dispose(): void {
    this.channel.dispose();
    if (Logger.instance === this) {
      Logger.instance = undefined;
    }
  }
}
