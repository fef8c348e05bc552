/**
 * File Transport
 *
 * Appends JSON lines to a file and rotates it once it grows past maxSize.
 * Rotated files are kept as `<path>.1` (newest) .. `<path>.<maxFiles>` (oldest).
 */

import * as fs from 'fs';
import * as path from 'path';
import type { LoggerTransport, LogEntry } from '../types.js';

export interface FileTransportConfig {
    /** Absolute path to log file */
    path: string;
    /** Max file size in bytes before rotation (default: 10MB) */
    maxSize?: number;
    /** Max number of rotated files to keep (default: 5) */
    maxFiles?: number;
}

export class FileTransport implements LoggerTransport {
    private filePath: string;
    private maxSize: number;
    private maxFiles: number;
    private writeStream: fs.WriteStream | null = null;
    private currentSize = 0;
    private rotation: Promise<void> | null = null;
    private pendingLines: string[] = [];

    constructor(config: FileTransportConfig) {
        this.filePath = config.path;
        this.maxSize = config.maxSize ?? 10 * 1024 * 1024;
        this.maxFiles = config.maxFiles ?? 5;

        fs.mkdirSync(path.dirname(this.filePath), { recursive: true });

        if (fs.existsSync(this.filePath)) {
            this.currentSize = fs.statSync(this.filePath).size;
        }

        this.writeStream = this.openStream();
    }

    write(entry: LogEntry): void {
        const line = JSON.stringify(entry) + '\n';

        if (this.rotation || !this.writeStream) {
            this.pendingLines.push(line);
            return;
        }

        const lineSize = Buffer.byteLength(line, 'utf8');
        if (this.currentSize > 0 && this.currentSize + lineSize > this.maxSize) {
            this.pendingLines.push(line);
            this.startRotation();
            return;
        }

        this.writeStream.write(line);
        this.currentSize += lineSize;
    }

    async destroy(): Promise<void> {
        if (this.rotation) {
            await this.rotation;
        }
        const stream = this.writeStream;
        this.writeStream = null;
        if (stream) {
            await new Promise<void>((resolve) => stream.end(() => resolve()));
        }
    }

    private openStream(): fs.WriteStream {
        const stream = fs.createWriteStream(this.filePath, { flags: 'a', encoding: 'utf8' });
        stream.on('error', (error) => {
            console.error('FileTransport write stream error:', error);
        });
        return stream;
    }

    private startRotation(): void {
        this.rotation = this.rotate()
            .catch((error: unknown) => {
                console.error('FileTransport rotation error:', error);
            })
            .finally(() => {
                this.rotation = null;
                this.flushPending();
            });
    }

    private async rotate(): Promise<void> {
        const stream = this.writeStream;
        this.writeStream = null;
        if (stream) {
            await new Promise<void>((resolve) => stream.end(() => resolve()));
        }

        await fs.promises.rm(`${this.filePath}.${this.maxFiles}`, { force: true });

        for (let i = this.maxFiles - 1; i >= 1; i--) {
            await renameIfExists(`${this.filePath}.${i}`, `${this.filePath}.${i + 1}`);
        }
        await renameIfExists(this.filePath, `${this.filePath}.1`);

        this.currentSize = 0;
        this.writeStream = this.openStream();
    }

    private flushPending(): void {
        const lines = this.pendingLines;
        this.pendingLines = [];
        for (const line of lines) {
            if (this.rotation || !this.writeStream) {
                this.pendingLines.push(line);
                continue;
            }
            const lineSize = Buffer.byteLength(line, 'utf8');
            if (this.currentSize > 0 && this.currentSize + lineSize > this.maxSize) {
                this.pendingLines.push(line);
                this.startRotation();
                continue;
            }
            this.writeStream.write(line);
            this.currentSize += lineSize;
        }
    }
}

async function renameIfExists(from: string, to: string): Promise<void> {
    try {
        await fs.promises.rename(from, to);
    } catch (error) {
        const missing = error instanceof Error && 'code' in error && error.code === 'ENOENT';
        if (!missing) {
            throw error;
        }
    }
}
