import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { TasklaneLogger } from './tasklane-logger.js';
import { TasklaneLogComponent } from './types.js';
import type { LogEntry, LoggerTransport } from './types.js';
import { ConsoleTransport } from './transports/console-transport.js';
import { FileTransport } from './transports/file-transport.js';
import { createLogger } from './factory.js';
import { LoggerConfigSchema } from './schemas.js';

class MemoryTransport implements LoggerTransport {
    entries: LogEntry[] = [];

    write(entry: LogEntry): void {
        this.entries.push(entry);
    }
}

function entry(overrides: Partial<LogEntry> = {}): LogEntry {
    return {
        level: 'info',
        message: 'hello',
        timestamp: '2026-01-01T12:00:00.000Z',
        component: TasklaneLogComponent.TODO,
        service: 'tasklane',
        ...overrides,
    };
}

describe('TasklaneLogger', () => {
    let transport: MemoryTransport;
    let logger: TasklaneLogger;

    beforeEach(() => {
        transport = new MemoryTransport();
        logger = new TasklaneLogger({
            level: 'info',
            component: TasklaneLogComponent.SERVER,
            service: 'tasklane',
            transports: [transport],
        });
    });

    it('should write structured entries', () => {
        logger.info('Server started', { port: 3000 });

        expect(transport.entries).toEqual([
            {
                level: 'info',
                message: 'Server started',
                timestamp: expect.any(String),
                component: 'server',
                service: 'tasklane',
                context: { port: 3000 },
            },
        ]);
    });

    it('should drop entries below the configured level', () => {
        logger.debug('noise');
        logger.silly('more noise');
        logger.warn('careful');

        expect(transport.entries.map((e) => e.level)).toEqual(['warn']);
    });

    it('should share level changes with children', () => {
        const child = logger.createChild(TasklaneLogComponent.STORAGE);

        child.setLevel('debug');
        logger.debug('parent debug');
        child.debug('child debug');

        expect(logger.getLevel()).toBe('debug');
        expect(transport.entries.map((e) => [e.component, e.message])).toEqual([
            ['server', 'parent debug'],
            ['storage', 'child debug'],
        ]);
    });

    it('should record exception details', () => {
        const error = new TypeError('bad value');

        logger.trackException(error, { path: '/todo' });

        expect(transport.entries[0]).toMatchObject({
            level: 'error',
            message: 'bad value',
            context: {
                path: '/todo',
                errorName: 'TypeError',
                errorType: 'TypeError',
                errorStack: error.stack,
            },
        });
    });

    it('should keep logging when a transport throws', () => {
        const consoleError = vi.spyOn(console, 'error').mockImplementation(() => {});
        const failing: LoggerTransport = {
            write: () => {
                throw new Error('transport down');
            },
        };
        const mixed = new TasklaneLogger({
            level: 'info',
            component: TasklaneLogComponent.SERVER,
            service: 'tasklane',
            transports: [failing, transport],
        });

        mixed.info('still delivered');

        expect(transport.entries.map((e) => e.message)).toEqual(['still delivered']);
        expect(consoleError).toHaveBeenCalledTimes(1);
        consoleError.mockRestore();
    });
});

describe('ConsoleTransport', () => {
    it('should format level, component and service', () => {
        const line = new ConsoleTransport({ colorize: false }).format(entry());

        expect(line).toContain('[INFO] [todo:tasklane] hello');
    });

    it('should append context as JSON', () => {
        const line = new ConsoleTransport({ colorize: false }).format(
            entry({ context: { id: 1 } })
        );

        expect(line.split('\n').slice(1).join('\n')).toBe('{\n  "id": 1\n}');
    });

    it('should send warnings to stderr', () => {
        const consoleError = vi.spyOn(console, 'error').mockImplementation(() => {});
        const consoleLog = vi.spyOn(console, 'log').mockImplementation(() => {});

        new ConsoleTransport({ colorize: false }).write(entry({ level: 'warn' }));

        expect(consoleError).toHaveBeenCalledTimes(1);
        expect(consoleLog).not.toHaveBeenCalled();
        consoleError.mockRestore();
        consoleLog.mockRestore();
    });
});

describe('FileTransport', () => {
    let dir: string;

    beforeEach(() => {
        dir = mkdtempSync(path.join(tmpdir(), 'tasklane-log-'));
    });

    afterEach(() => {
        rmSync(dir, { recursive: true, force: true });
    });

    it('should append JSON lines', async () => {
        const filePath = path.join(dir, 'logs', 'tasklane.log');
        const transport = new FileTransport({ path: filePath });

        transport.write(entry({ message: 'first' }));
        transport.write(entry({ message: 'second' }));
        await transport.destroy();

        const lines = readFileSync(filePath, 'utf8').trim().split('\n');
        expect(lines.map((line) => JSON.parse(line).message)).toEqual(['first', 'second']);
    });

    it('should rotate once the file grows past maxSize', async () => {
        const filePath = path.join(dir, 'tasklane.log');
        const transport = new FileTransport({ path: filePath, maxSize: 10, maxFiles: 2 });

        transport.write(entry({ message: 'first' }));
        transport.write(entry({ message: 'second' }));
        await transport.destroy();

        expect(JSON.parse(readFileSync(`${filePath}.1`, 'utf8')).message).toBe('first');
        expect(JSON.parse(readFileSync(filePath, 'utf8')).message).toBe('second');
    });
});

describe('createLogger', () => {
    it('should build a logger from validated config', () => {
        const config = LoggerConfigSchema.parse({ level: 'warn', transports: [{ type: 'silent' }] });

        const logger = createLogger({ config, service: 'tasklane' });

        expect(logger.getLevel()).toBe('warn');
    });
});
