/**
 * @fileoverview LogTailer - incremental reader for the server log file.
 *
 * Remembers a byte offset and returns the complete lines appended since the
 * last read. A trailing line without its newline is held back until the rest
 * arrives. When the file shrinks or is replaced (rotation), reading restarts
 * from the beginning of the new file.
 *
 * @module log-tailer
 */

import { open, stat } from 'node:fs/promises';
import { StringDecoder } from 'node:string_decoder';
import {
  MAX_PENDING_LINE_LENGTH,
  MAX_READ_BYTES_PER_TICK,
  TAIL_READ_BYTES,
} from './config/log-limits.js';
import type { LogSource } from './types.js';

export class LogTailer implements LogSource {
  private readonly filePath: string;
  private offset = 0;
  private inode: number | null = null;
  private pending = '';
  private decoder = new StringDecoder('utf8');

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  get position(): number {
    return this.offset;
  }

  async readNewLines(): Promise<string[]> {
    const info = await this.statOrNull();
    if (!info) return [];

    if (this.inode !== null && info.ino !== this.inode) {
      console.log(`[LogTailer] ${this.filePath} was replaced, reading from the start`);
      this.resetPosition();
    } else if (info.size < this.offset) {
      console.log(`[LogTailer] ${this.filePath} was truncated, reading from the start`);
      this.resetPosition();
    }
    this.inode = info.ino;

    if (info.size === this.offset) return [];

    const chunk = await this.readAt(this.offset, Math.min(info.size - this.offset, MAX_READ_BYTES_PER_TICK));
    this.offset += chunk.length;

    const text = this.pending + this.decoder.write(chunk);
    const lines = text.split(/\r?\n/);
    this.pending = lines.pop() ?? '';
    if (this.pending.length > MAX_PENDING_LINE_LENGTH) {
      // A runaway line with no newline: emit what we have
      lines.push(this.pending);
      this.pending = '';
    }
    return lines.filter((line) => line.length > 0);
  }

  /**
   * Last `maxLines` complete lines of the file, without moving the offset.
   */
  async readTail(maxLines: number): Promise<string[]> {
    const info = await this.statOrNull();
    if (!info || info.size === 0 || maxLines <= 0) return [];

    const length = Math.min(info.size, TAIL_READ_BYTES);
    const start = info.size - length;
    const chunk = await this.readAt(start, length);

    const lines = chunk.toString('utf8').split(/\r?\n/);
    // The first line is probably cut when we did not start at byte 0
    if (start > 0) lines.shift();
    return lines.filter((line) => line.length > 0).slice(-maxLines);
  }

  /** Skip everything already in the file */
  async seekToEnd(): Promise<void> {
    const info = await this.statOrNull();
    this.resetPosition();
    if (info) {
      this.offset = info.size;
      this.inode = info.ino;
    }
  }

  private resetPosition(): void {
    this.offset = 0;
    this.pending = '';
    this.decoder = new StringDecoder('utf8');
  }

  private async readAt(position: number, length: number): Promise<Buffer> {
    const handle = await open(this.filePath, 'r');
    try {
      const buffer = Buffer.alloc(length);
      const { bytesRead } = await handle.read(buffer, 0, length, position);
      return buffer.subarray(0, bytesRead);
    } finally {
      await handle.close();
    }
  }

  private async statOrNull(): Promise<{ size: number; ino: number } | null> {
    try {
      const info = await stat(this.filePath);
      return { size: info.size, ino: info.ino };
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code === 'ENOENT') return null;
      throw err;
    }
  }
}
