import * as crypto from 'crypto';

export interface RunContext {
    runId: string;
    startedAt: Date;
    target: string;
}

export function createRunContext(target: string, now: Date = new Date()): RunContext {
    return {
        runId: crypto.randomUUID(),
        startedAt: now,
        target,
    };
}

/** `1h 02m 05s` style duration since the run started. */
export function formatElapsed(ctx: RunContext, now: Date = new Date()): string {
    const totalSeconds = Math.max(0, Math.round((now.getTime() - ctx.startedAt.getTime()) / 1000));
    const hours = Math.floor(totalSeconds / 3600);
    const minutes = Math.floor((totalSeconds % 3600) / 60);
    const seconds = totalSeconds % 60;
    const mm = String(minutes).padStart(2, '0');
    const ss = String(seconds).padStart(2, '0');
    return hours > 0 ? `${hours}h ${mm}m ${ss}s` : `${minutes}m ${ss}s`;
}
