/**
 * Command Execution Wrapper
 * 
 * Runs yt-dlp / ffmpeg style tools with:
 * - Timeout handling
 * - Output capture (bounded)
 * - Line-by-line streaming of stdout and stderr
 * - Abort signal forwarding
 */

import { spawn } from 'node:child_process';
import { StringDecoder } from 'node:string_decoder';
import { logger } from './logger.js';

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  duration: number;
  timedOut: boolean;
}

export interface CommandOptions {
  cwd?: string;
  timeout?: number; // milliseconds
  maxOutputSize?: number; // bytes kept per stream
  signal?: AbortSignal;
  onStdoutLine?: (line: string) => void;
  onStderrLine?: (line: string) => void;
}

/**
 * Signature shared by everything that shells out, so callers can be
 * handed a fake runner in tests.
 */
export type CommandRunner = (
  command: string,
  args: string[],
  options?: CommandOptions
) => Promise<CommandResult>;

/**
 * Splits a chunked byte stream into lines. Progress bars redraw with `\r`,
 * so carriage returns end a line as well.
 */
export class LineSplitter {
  private buffer = '';

  constructor(private readonly onLine: (line: string) => void) {}

  push(chunk: string): void {
    this.buffer += chunk;
    const parts = this.buffer.split(/\r\n|\r|\n/);
    this.buffer = parts.pop() ?? '';
    for (const part of parts) {
      this.emit(part);
    }
  }

  flush(): void {
    const rest = this.buffer;
    this.buffer = '';
    this.emit(rest);
  }

  private emit(line: string): void {
    const trimmed = line.trim();
    if (trimmed) {
      this.onLine(trimmed);
    }
  }
}

/**
 * Bounded capture of one output stream. Decoding is stateful, so a
 * multi-byte character split between two chunks comes out whole.
 */
export class OutputCollector {
  private readonly decoder = new StringDecoder('utf8');
  private readonly lines: LineSplitter | null;
  private text = '';
  private size = 0;

  constructor(
    private readonly maxSize: number,
    onLine?: (line: string) => void
  ) {
    this.lines = onLine ? new LineSplitter(onLine) : null;
  }

  push(data: Buffer): void {
    this.append(this.decoder.write(data), data.length);
  }

  /**
   * Flush the decoder and any partial line; returns the captured text
   */
  end(): string {
    const rest = this.decoder.end();
    this.append(rest, Buffer.byteLength(rest));
    this.lines?.flush();
    return this.text;
  }

  private append(chunk: string, bytes: number): void {
    if (!chunk) return;
    if (this.size < this.maxSize) {
      this.text += chunk;
      this.size += bytes;
    }
    this.lines?.push(chunk);
  }
}

/**
 * Execute an external command
 * 
 * Resolves with the exit code rather than rejecting on failure; only a
 * spawn error (missing binary, permissions) rejects.
 */
export const executeCommand: CommandRunner = async (command, args, options = {}) => {
  const {
    cwd = process.cwd(),
    timeout = 300000, // 5 minutes default
    maxOutputSize = 10 * 1024 * 1024, // 10MB default
    signal,
    onStdoutLine,
    onStderrLine,
  } = options;

  const startTime = Date.now();
  let timedOut = false;

  logger.debug({ command, args }, 'Executing command');

  return new Promise<CommandResult>((resolve, reject) => {
    const child = spawn(command, args, {
      cwd,
      env: process.env,
      stdio: ['ignore', 'pipe', 'pipe'],
    });

    const stdout = new OutputCollector(maxOutputSize, onStdoutLine);
    const stderr = new OutputCollector(maxOutputSize, onStderrLine);

    const timeoutId = setTimeout(() => {
      timedOut = true;
      child.kill('SIGTERM');
      // Force kill after 10 seconds
      setTimeout(() => child.kill('SIGKILL'), 10000).unref();
    }, timeout);

    const onAbort = (): void => {
      child.kill('SIGTERM');
    };
    signal?.addEventListener('abort', onAbort, { once: true });

    child.stdout?.on('data', (data: Buffer) => stdout.push(data));
    child.stderr?.on('data', (data: Buffer) => stderr.push(data));

    child.on('close', (code, killSignal) => {
      clearTimeout(timeoutId);
      signal?.removeEventListener('abort', onAbort);

      resolve({
        exitCode: code ?? (killSignal ? 128 : 1),
        stdout: stdout.end(),
        stderr: stderr.end(),
        duration: Date.now() - startTime,
        timedOut,
      });
    });

    child.on('error', (error) => {
      clearTimeout(timeoutId);
      signal?.removeEventListener('abort', onAbort);
      reject(error);
    });
  });
};
