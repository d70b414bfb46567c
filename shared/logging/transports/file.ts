/**
 * File Transport
 *
 * Appends JSON lines to a dated log file and rotates it by size.
 * Node.js only.
 */

import * as fs from "fs";
import * as path from "path";
import type { LogTransport, LogEntry, LogLevel } from "../types.js";

export interface FileTransportOptions {
  minLevel?: LogLevel;
  logDir: string;
  /** Base filename (default: "waypoint") */
  filename?: string;
  /** Bytes before rotation (default: 5MB) */
  maxSize?: number;
  /** Rotated files to keep (default: 5) */
  maxFiles?: number;
}

export class FileTransport implements LogTransport {
  name = "file";
  minLevel: LogLevel;
  private logDir: string;
  private filename: string;
  private maxSize: number;
  private maxFiles: number;
  private currentPath: string;
  private currentSize = 0;
  private stream: fs.WriteStream;
  private pending = 0;
  private idleWaiters: Array<() => void> = [];

  constructor(options: FileTransportOptions) {
    this.minLevel = options.minLevel ?? "info";
    this.logDir = options.logDir;
    this.filename = options.filename ?? "waypoint";
    this.maxSize = options.maxSize ?? 5 * 1024 * 1024;
    this.maxFiles = options.maxFiles ?? 5;

    fs.mkdirSync(this.logDir, { recursive: true });
    this.currentPath = this.pathForToday();
    this.stream = this.open(this.currentPath);
  }

  private pathForToday(): string {
    const date = new Date().toISOString().slice(0, 10);
    return path.join(this.logDir, `${this.filename}-${date}.log`);
  }

  private open(filePath: string): fs.WriteStream {
    try {
      this.currentSize = fs.statSync(filePath).size;
    } catch {
      this.currentSize = 0;
    }
    const stream = fs.createWriteStream(filePath, { flags: "a" });
    stream.on("error", (err: Error) => {
      console.error("[FileTransport] Write error:", err);
    });
    return stream;
  }

  log(entry: LogEntry): void {
    const line = JSON.stringify(entry) + "\n";
    const bytes = Buffer.byteLength(line);

    const todayPath = this.pathForToday();
    if (todayPath !== this.currentPath) {
      this.stream.end();
      this.currentPath = todayPath;
      this.stream = this.open(todayPath);
    } else if (this.currentSize + bytes > this.maxSize) {
      this.rotate();
    }

    this.pending++;
    this.currentSize += bytes;
    this.stream.write(line, () => {
      this.pending--;
      if (this.pending === 0) {
        for (const wake of this.idleWaiters.splice(0)) wake();
      }
    });
  }

  private rotate(): void {
    this.stream.end();

    const oldest = `${this.currentPath}.${this.maxFiles}`;
    if (fs.existsSync(oldest)) fs.unlinkSync(oldest);
    for (let i = this.maxFiles - 1; i >= 1; i--) {
      const from = `${this.currentPath}.${i}`;
      if (fs.existsSync(from)) fs.renameSync(from, `${this.currentPath}.${i + 1}`);
    }
    if (fs.existsSync(this.currentPath)) {
      fs.renameSync(this.currentPath, `${this.currentPath}.1`);
    }

    this.stream = this.open(this.currentPath);
  }

  flush(): Promise<void> {
    if (this.pending === 0) return Promise.resolve();
    return new Promise(resolve => this.idleWaiters.push(resolve));
  }

  async close(): Promise<void> {
    await this.flush();
    await new Promise<void>(resolve => this.stream.end(() => resolve()));
  }
}
