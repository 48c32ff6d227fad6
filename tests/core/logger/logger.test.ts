import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { readFile, mkdir, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { attempt } from '@logosdx/utils';

import type { LoggerConfigInput } from '../../../src/core/config/index.js';
import { levelLabel } from '../../../src/core/level/index.js';
import { FileAccessError, LogWriteError, LoggerAccessError } from '../../../src/core/logger/errors.js';
import { Logger, getLogger, resetLogger } from '../../../src/core/logger/logger.js';
import type { Stylizer } from '../../../src/core/style/index.js';
import { FailingStream, MemoryStream, nextTurn } from '../../utils/streams.js';

const bracketStylize: Stylizer = (level) => `<${levelLabel(level)}>`;

describe('logger: Logger class', () => {

    let testDir: string;
    let stdout: MemoryStream;
    let stderr: MemoryStream;
    let loggers: Logger[];

    function createLogger(config: LoggerConfigInput = {}): Logger {

        const logger = new Logger({
            name: 'test',
            config,
            env: false,
            streams: { stdout, stderr },
            stylize: bracketStylize,
            clock: () => new Date('2024-01-15T10:30:00Z'),
            autoStart: false,
        });

        loggers.push(logger);

        return logger;

    }

    beforeEach(async () => {

        testDir = join(
            tmpdir(),
            `logwright-test-logger-${Date.now()}-${Math.random().toString(36).slice(2)}`,
        );
        await mkdir(testDir, { recursive: true });
        stdout = new MemoryStream();
        stderr = new MemoryStream();
        loggers = [];

    });

    afterEach(async () => {

        for (const logger of loggers) {

            await logger.stop();

        }

        await resetLogger();
        await rm(testDir, { recursive: true, force: true });

    });

    describe('construction', () => {

        it('should start idle without autoStart', () => {

            const logger = createLogger();

            expect(logger.state).toBe('idle');
            expect(logger.name).toBe('test');
            expect(logger.isRolling).toBe(false);
            expect(logger.filepath).toBeNull();

        });

        it('should apply explicit config over environment', () => {

            const fromEnv = new Logger({
                env: { LOGWRIGHT_LEVEL: 'error', LOGWRIGHT_TERMINAL_OUTPUT: 'stderr' },
                autoStart: false,
            });
            const overridden = new Logger({
                env: { LOGWRIGHT_LEVEL: 'error' },
                config: { minLevel: 'warning' },
                autoStart: false,
            });

            loggers.push(fromEnv, overridden);

            expect(fromEnv.config.current.minLevel).toBe('error');
            expect(fromEnv.config.current.terminal.output).toBe('stderr');
            expect(overridden.config.current.minLevel).toBe('warning');

        });

        it('should emit logger:started once', () => {

            const logger = createLogger();
            const started: string[] = [];

            logger.observer.on('logger:started', ({ name }) => {

                started.push(name);

            });

            logger.start();
            logger.start();

            expect(logger.state).toBe('running');
            expect(started).toEqual(['test']);

        });

    });

    describe('log', () => {

        it('should render level and message', async () => {

            const logger = createLogger({ format: '{level} - {message}' });

            logger.log('info', 'app::main', 'Test message');
            await logger.flush();

            expect(stdout.text).toBe('<INFO> - Test message\n');

        });

        it('should render the default format', async () => {

            const logger = createLogger({ timezone: 'utc' });

            logger.log('warning', 'app::main', 'Disk almost full');
            await logger.flush();

            expect(stdout.lines).toEqual(['[2024-01-15 10:30:00 app::main] <WARNING>: Disk almost full']);

        });

        it('should queue until flushed', async () => {

            const logger = createLogger();

            logger.log('info', 'app', 'one');
            logger.log('info', 'app', 'two');

            expect(logger.pending).toEqual({ terminal: 2, file: 0 });
            expect(stdout.text).toBe('');

            await logger.flush();

            expect(logger.pending).toEqual({ terminal: 0, file: 0 });
            expect(stdout.lines).toHaveLength(2);

        });

        it('should drop levels below the minimum', async () => {

            const logger = createLogger({ format: '{level}', minLevel: 'warning' });

            logger.log('trace', 'app', 'x');
            logger.log('info', 'app', 'x');
            logger.log('warning', 'app', 'x');
            logger.log('error', 'app', 'x');
            await logger.flush();

            expect(stdout.lines).toEqual(['<WARNING>', '<ERROR>']);

        });

        it('should drop everything with a minimum of none', async () => {

            const logger = createLogger({ minLevel: 'none' });

            logger.log('fatal', 'app', 'x');
            logger.log('diagnostic', 'app', 'x');
            await logger.flush();

            expect(stdout.text).toBe('');

        });

        it('should drop debug-only levels in release builds', async () => {

            const logger = createLogger({ format: '{level}', buildMode: 'release' });

            logger.log('debug', 'app', 'x');
            logger.log('diagnostic', 'app', 'x');
            logger.log('info', 'app', 'x');
            await logger.flush();

            expect(stdout.lines).toEqual(['<INFO>']);

        });

        it('should pick up configuration changes on the next call', async () => {

            const logger = createLogger({ format: '{message}' });

            logger.log('info', 'app', 'before');
            logger.config.setLogFormat('{level} {message}').setTerminalOutput('stderr');
            logger.log('info', 'app', 'after');
            await logger.flush();

            expect(stdout.text).toBe('');
            expect(stderr.text).toBe('before\n<INFO> after\n');

        });

        it('should skip the terminal when it is disabled', async () => {

            const logger = createLogger({ format: '{message}' });

            logger.config.setTerminalEnabled(false);
            logger.log('error', 'app', 'hidden');
            await logger.flush();

            expect(stdout.text).toBe('');

        });

    });

    describe('file output', () => {

        it('should write plain labels to the file and styled labels to the terminal', async () => {

            const filepath = join(testDir, 'app.log');
            const logger = createLogger({ format: '{level} - {message}', file: { enabled: true, path: filepath } });

            logger.log('error', 'app', 'Failed');
            await logger.flush();

            expect(await readFile(filepath, 'utf-8')).toBe('ERROR - Failed\n');
            expect(stdout.text).toBe('<ERROR> - Failed\n');

        });

        it('should stop and resume file writes with the enabled flag', async () => {

            const filepath = join(testDir, 'app.log');
            const logger = createLogger({ format: '{message}', file: { enabled: true, path: filepath } });

            logger.log('info', 'app', 'first');
            await logger.flush();

            logger.config.setFileEnabled(false);
            logger.log('info', 'app', 'skipped');
            await logger.flush();

            logger.config.setFileEnabled(true);
            logger.log('info', 'app', 'second');
            await logger.flush();

            expect(await readFile(filepath, 'utf-8')).toBe('first\nsecond\n');
            expect(stdout.lines).toEqual(['first', 'skipped', 'second']);

        });

        it('should write to the file within the flush interval once started', async () => {

            const filepath = join(testDir, 'timed.log');
            const logger = createLogger({
                format: '{message}',
                file: { enabled: true, path: filepath, flushInterval: 5 },
            });

            logger.start();
            logger.log('info', 'app', 'background write');
            await new Promise((resolve) => setTimeout(resolve, 60));

            expect(await readFile(filepath, 'utf-8')).toBe('background write\n');

        });

        it('should honor terminal, file and global ignore lists independently', async () => {

            const filepath = join(testDir, 'app.log');
            const logger = createLogger({ format: '{message}', file: { enabled: true, path: filepath } });

            logger.config
                .setTerminalIgnore('debug')
                .setFileIgnore('info')
                .addGlobalIgnore('warning');

            logger.log('debug', 'app', 'debug');
            logger.log('info', 'app', 'info');
            logger.log('warning', 'app', 'warning');
            logger.log('error', 'app', 'error');
            await logger.flush();

            expect(stdout.lines).toEqual(['info', 'error']);
            expect(await readFile(filepath, 'utf-8')).toBe('debug\nerror\n');

        });

        it('should not queue file lines while no path is set', () => {

            const logger = createLogger({ file: { enabled: true } });

            logger.log('info', 'app', 'x');

            expect(logger.pending).toEqual({ terminal: 1, file: 0 });

        });

    });

    describe('structuredLog', () => {

        it('should append pairs in insertion order', async () => {

            const logger = createLogger({ format: '{level}: {message}' });

            logger.structuredLog('info', 'app', 'Login', { user: 'ada', attempts: 2 });
            await logger.flush();

            expect(stdout.text).toBe('<INFO>: Login user=ada attempts=2\n');

        });

        it('should use the configured pair template', async () => {

            const logger = createLogger({ format: '{message}', structuredFormat: ' [{key}:{value}]' });

            logger.structuredLog('info', 'app', 'Saved', new Map([['id', 7], ['rev', 3]]));
            await logger.flush();

            expect(stdout.text).toBe('Saved [id:7] [rev:3]\n');

        });

        it('should filter like log', async () => {

            const logger = createLogger({ minLevel: 'error' });

            logger.structuredLog('info', 'app', 'x', { a: 1 });
            await logger.flush();

            expect(stdout.text).toBe('');

        });

    });

    describe('resultLog', () => {

        it('should write before resolving', async () => {

            const filepath = join(testDir, 'app.log');
            const logger = createLogger({ format: '{level} {message}', file: { enabled: true, path: filepath } });

            await logger.resultLog('critical', 'app', 'Now');

            expect(stdout.text).toBe('<CRITICAL> Now\n');
            expect(await readFile(filepath, 'utf-8')).toBe('CRITICAL Now\n');
            expect(logger.pending).toEqual({ terminal: 0, file: 0 });

        });

        it('should resolve without writing for filtered levels', async () => {

            const logger = createLogger({ buildMode: 'release' });

            await logger.resultLog('debug', 'app', 'x');

            expect(stdout.text).toBe('');

        });

        it('should reject with FileAccessError when the file cannot be created', async () => {

            const blocker = join(testDir, 'blocker');
            await writeFile(blocker, '');

            const logger = createLogger({ file: { enabled: true, path: join(blocker, 'app.log') } });

            const [, err] = await attempt(() => logger.resultLog('error', 'app', 'x'));

            expect(err).toBeInstanceOf(FileAccessError);

        });

        it('should reject with LoggerAccessError once stopped', async () => {

            const logger = createLogger();

            await logger.stop();

            const [, err] = await attempt(() => logger.resultLog('info', 'app', 'x'));

            expect(err).toBeInstanceOf(LoggerAccessError);
            expect(err?.message).toBe("Failed to access logger: logger 'test' has been stopped");

        });

        it('should reject with LogWriteError when the terminal pipe is closed', async () => {

            const logger = new Logger({
                name: 'test',
                config: { format: '{message}' },
                env: false,
                streams: { stdout: new FailingStream('EPIPE'), stderr },
                autoStart: false,
            });
            const errors: Error[] = [];

            loggers.push(logger);
            logger.observer.on('sink:error', ({ error }) => {

                errors.push(error);

            });

            const [, err] = await attempt(() => logger.resultLog('info', 'app', 'lost'));

            await nextTurn();

            expect(err).toBeInstanceOf(LogWriteError);
            expect(err?.message).toBe('I/O error writing to terminal: EPIPE');
            expect(errors).toEqual([]);

            logger.config.setTerminalOutput('stderr');
            logger.log('info', 'app', 'kept');
            await logger.flush();

            expect(stderr.text).toBe('kept\n');

        });

    });

    describe('setFilePath', () => {

        it('should create directories and open the file', async () => {

            const filepath = join(testDir, 'a', 'b', 'app.log');
            const logger = createLogger({ file: { enabled: true } });

            await logger.setFilePath(filepath);

            expect(logger.config.current.file.path).toBe(filepath);
            expect(logger.filepath).toBe(filepath);
            expect(await readFile(filepath, 'utf-8')).toBe('');

        });

        it('should publish the path even when opening fails', async () => {

            const blocker = join(testDir, 'blocker');
            await writeFile(blocker, '');

            const logger = createLogger({ file: { enabled: true } });
            const filepath = join(blocker, 'app.log');

            const [, err] = await attempt(() => logger.setFilePath(filepath));

            expect(err).toBeInstanceOf(FileAccessError);
            expect(logger.config.current.file.path).toBe(filepath);

        });

    });

    describe('rollover', () => {

        it('should keep only the newest lines', async () => {

            const filepath = join(testDir, 'app.log');
            const logger = createLogger({
                format: '{message}',
                terminal: { enabled: false },
                file: { enabled: true, path: filepath, rollover: 3 },
            });

            for (let i = 1; i <= 5; i++) {

                logger.log('info', 'app', `line ${i}`);

            }

            await logger.flush();
            await logger.rollover();

            expect(await readFile(filepath, 'utf-8')).toBe('line 3\nline 4\nline 5\n');
            expect(logger.isRolling).toBe(false);

            logger.log('info', 'app', 'line 6');
            await logger.flush();

            expect(await readFile(filepath, 'utf-8')).toBe('line 3\nline 4\nline 5\nline 6\n');

        });

        it('should append writes that arrive mid-rollover after the kept tail', async () => {

            const filepath = join(testDir, 'app.log');
            const lines = Array.from({ length: 10 }, (_, i) => `line ${i + 1}`);

            await writeFile(filepath, `${lines.join('\n')}\n`);

            const logger = createLogger({
                format: '{level} {message}',
                terminal: { enabled: false },
                file: { enabled: true, path: filepath, rollover: 3 },
            });
            const writes: Promise<void>[] = [];
            const rollingAtWrite: boolean[] = [];

            logger.observer.on('rollover:start', () => {

                rollingAtWrite.push(logger.isRolling);
                writes.push(logger.resultLog('info', 'app', 'checked'));
                logger.log('warning', 'app', 'queued');
                writes.push(logger.flush());

            });

            await logger.rollover();
            await Promise.all(writes);

            expect(rollingAtWrite).toEqual([true]);
            expect(writes).toHaveLength(2);
            expect(await readFile(filepath, 'utf-8')).toBe(
                'line 8\nline 9\nline 10\nINFO checked\nWARNING queued\n',
            );

        });

    });

    describe('stop', () => {

        it('should survive a closed terminal pipe in the background loop', async () => {

            const logger = new Logger({
                name: 'test',
                config: { terminal: { flushInterval: 5 } },
                env: false,
                streams: { stdout: new FailingStream('EPIPE'), stderr },
                autoStart: false,
            });
            const errors: Error[] = [];

            loggers.push(logger);
            logger.observer.on('sink:error', ({ sink, error }) => {

                errors.push(error);
                expect(sink).toBe('terminal');

            });

            logger.start();
            logger.log('info', 'app', 'lost');

            await new Promise((resolve) => setTimeout(resolve, 50));

            expect(errors).toHaveLength(1);
            expect(errors[0]).toBeInstanceOf(LogWriteError);
            expect(logger.state).toBe('running');

        });

        it('should flush pending lines and close the file', async () => {

            const filepath = join(testDir, 'app.log');
            const logger = createLogger({ format: '{message}', file: { enabled: true, path: filepath } });

            logger.start();
            logger.log('info', 'app', 'last words');
            await logger.stop();

            expect(logger.state).toBe('stopped');
            expect(logger.filepath).toBeNull();
            expect(stdout.text).toBe('last words\n');
            expect(await readFile(filepath, 'utf-8')).toBe('last words\n');

        });

        it('should drop log calls after stop', async () => {

            const logger = createLogger();

            await logger.stop();
            logger.log('info', 'app', 'x');
            logger.structuredLog('info', 'app', 'x', { a: 1 });

            expect(logger.pending).toEqual({ terminal: 0, file: 0 });

        });

        it('should emit logger:stopped once', async () => {

            const logger = createLogger();
            const stopped: string[] = [];

            logger.observer.on('logger:stopped', ({ name }) => {

                stopped.push(name);

            });

            await logger.stop();
            await logger.stop();

            expect(stopped).toEqual(['test']);

        });

    });

});

describe('logger: singleton', () => {

    afterEach(async () => {

        await resetLogger();

    });

    it('should return the same instance', () => {

        const first = getLogger({ autoStart: false, env: false });
        const second = getLogger({ name: 'ignored' });

        expect(second).toBe(first);
        expect(second.name).toBe('logwright');

    });

    it('should stop and replace the instance on reset', async () => {

        const first = getLogger({ autoStart: false, env: false });

        await resetLogger();

        const second = getLogger({ autoStart: false, env: false });

        expect(first.state).toBe('stopped');
        expect(second).not.toBe(first);

    });

});
