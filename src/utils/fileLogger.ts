/**
 * src/utils/fileLogger.ts
 *
 * Dual-output logging: every Crawlee log line goes to stdout/stderr as usual
 * AND to a dated file `<logDir>/crawl_YYYYMMDD.log`.
 *
 * BEHAVIOUR
 * ─────────
 *  • Runs on the same day share one file; each run appends a header line
 *    carrying its run id.
 *  • stdout and stderr writes are mirrored into the file in real time.
 *  • closeFileLogger() restores both streams and closes the file.
 */

import * as fs from 'fs';
import * as path from 'path';
import type { RunContext } from './runContext.js';

type StreamWrite = NodeJS.WriteStream['write'];

let writeStream: fs.WriteStream | null = null;
let originalStdoutWrite: StreamWrite | null = null;
let originalStderrWrite: StreamWrite | null = null;

export function logFileName(date: Date): string {
    const y = date.getFullYear();
    const m = String(date.getMonth() + 1).padStart(2, '0');
    const d = String(date.getDate()).padStart(2, '0');
    return `crawl_${y}${m}${d}.log`;
}

function mirror(stream: NodeJS.WriteStream): StreamWrite {
    const original = stream.write;
    const hooked = (chunk: string | Uint8Array, ...rest: unknown[]): boolean => {
        writeStream?.write(chunk);
        return Reflect.apply(original, stream, [chunk, ...rest]);
    };
    stream.write = hooked;
    return original;
}

/**
 * Start mirroring output into the day's log file.
 * Call ONCE at the start of main(), before any log output.
 *
 * @returns the log file path
 */
export function initFileLogger(logDir: string, ctx: RunContext): string {
    const logFile = path.resolve(logDir, logFileName(ctx.startedAt));
    fs.mkdirSync(path.dirname(logFile), { recursive: true });

    writeStream = fs.createWriteStream(logFile, { flags: 'a', encoding: 'utf-8' });
    writeStream.write(`\n--- RUN ${ctx.runId} STARTED ${ctx.startedAt.toISOString()} (${ctx.target}) ---\n`);

    if (!originalStdoutWrite) originalStdoutWrite = mirror(process.stdout);
    if (!originalStderrWrite) originalStderrWrite = mirror(process.stderr);

    return logFile;
}

/**
 * Restore stdout/stderr and close the log file. Resolves once the file is
 * flushed. Call in the finally/cleanup block.
 */
export function closeFileLogger(): Promise<void> {
    if (originalStdoutWrite) {
        process.stdout.write = originalStdoutWrite;
        originalStdoutWrite = null;
    }
    if (originalStderrWrite) {
        process.stderr.write = originalStderrWrite;
        originalStderrWrite = null;
    }

    const stream = writeStream;
    writeStream = null;
    if (!stream) return Promise.resolve();
    return new Promise((resolve) => {
        stream.end(() => resolve());
    });
}
