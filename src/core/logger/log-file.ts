/**
 * Log File
 *
 * The shared handle to the configured log file. Opened lazily (or
 * eagerly by `Logger.setFilePath`), kept open, and reopened only when
 * the configured path changes. Every access goes through one
 * `FileLock`, which is what keeps sink appends, `resultLog` appends and
 * rollover rewrites from interleaving.
 *
 * @example
 * ```typescript
 * const file = new LogFile(observer)
 *
 * await file.open('/var/log/app/app.log')   // creates /var/log/app
 * await file.append('/var/log/app/app.log', ['line 1', 'line 2'])
 * await file.close()
 * ```
 */
import { mkdir, open, type FileHandle } from 'node:fs/promises'
import { dirname, join } from 'node:path'
import { attempt } from '@logosdx/utils'

import type { LoggerObserver } from '../observer.js'
import { FileAccessError, LogWriteError } from './errors.js'
import { FileLock } from './lock.js'
import { joinLines } from './queue.js'


/**
 * File name used when the configured path is empty.
 */
export const FALLBACK_FILE_NAME = '.logger'


/**
 * Resolve the configured path to the file actually written.
 *
 * An empty path means `.logger` in the working directory.
 *
 * @example
 * ```typescript
 * resolveLogPath('logs/app.log')  // 'logs/app.log'
 * resolveLogPath('')              // '/current/dir/.logger'
 * ```
 */
export function resolveLogPath(path: string): string {

    if (path === '') {

        return join(process.cwd(), FALLBACK_FILE_NAME)
    }

    return path
}


export class LogFile {

    #observer: LoggerObserver
    #lock = new FileLock()
    #handle: FileHandle | null = null
    #filepath: string | null = null

    constructor(observer: LoggerObserver) {

        this.#observer = observer
    }


    /**
     * Path of the open file, or null when nothing is open.
     */
    get filepath(): string | null {

        return this.#filepath
    }


    /**
     * Check if a file handle is open.
     */
    get isOpen(): boolean {

        return this.#handle !== null
    }


    /**
     * Check if some caller currently holds the file lock.
     */
    get isLocked(): boolean {

        return this.#lock.isHeld
    }


    /**
     * Open (or reuse) the file at `filepath` for read+append.
     *
     * Creates missing parent directories.
     *
     * @throws FileAccessError if the directory or file cannot be created
     */
    async open(filepath: string): Promise<void> {

        await this.#lock.run(async () => {

            await this.#ensureOpen(filepath)
        })
    }


    /**
     * Run `fn` with exclusive access to the open handle for `filepath`.
     *
     * @throws FileAccessError if the file cannot be opened
     */
    exclusive<T>(filepath: string, fn: (handle: FileHandle) => Promise<T>): Promise<T> {

        return this.#lock.run(async () => {

            const handle = await this.#ensureOpen(filepath)

            return fn(handle)
        })
    }


    /**
     * Append lines, each followed by a newline, as a single write.
     *
     * @throws FileAccessError if the file cannot be opened
     * @throws LogWriteError if the write fails
     */
    async append(filepath: string, lines: readonly string[]): Promise<void> {

        if (lines.length === 0) {

            return
        }

        await this.exclusive(filepath, async (handle) => {

            const [, err] = await attempt(() => handle.write(joinLines(lines)))

            if (err) {

                throw new LogWriteError('file', err)
            }
        })
    }


    /**
     * Close the handle, waiting for any holder of the lock first.
     */
    async close(): Promise<void> {

        await this.#lock.run(() => this.#close())
    }


    /**
     * Return the open handle, reopening when the path changed.
     */
    async #ensureOpen(filepath: string): Promise<FileHandle> {

        if (this.#handle && this.#filepath === filepath) {

            return this.#handle
        }

        await this.#close()

        const [, mkdirErr] = await attempt(() => mkdir(dirname(filepath), { recursive: true }))

        if (mkdirErr) {

            throw new FileAccessError(filepath, mkdirErr)
        }

        const [handle, openErr] = await attempt(() => open(filepath, 'a+'))

        if (openErr) {

            throw new FileAccessError(filepath, openErr)
        }

        this.#handle = handle
        this.#filepath = filepath

        this.#observer.emit('file:opened', { file: filepath })

        return handle
    }


    async #close(): Promise<void> {

        const handle = this.#handle
        const filepath = this.#filepath

        if (!handle || filepath === null) {

            return
        }

        this.#handle = null
        this.#filepath = null

        const [, err] = await attempt(() => handle.close())

        if (err) {

            this.#observer.emit('sink:error', { sink: 'file', error: err })
        }

        this.#observer.emit('file:closed', { file: filepath })
    }
}
