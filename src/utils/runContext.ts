import * as crypto from 'crypto';

export interface RunContext {
    runId: string;
    startedAt: Date;
    /** found_at value shared by every record of the run. */
    foundAt: string;
}

function pad(n: number): string {
    return String(n).padStart(2, '0');
}

/** Local wall-clock time as YYYY-MM-DD HH:MM:SS. */
export function formatTimestamp(date: Date): string {
    return (
        `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
        `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
    );
}

export function createRunContext(now: Date = new Date()): RunContext {
    return {
        runId: crypto.randomUUID(),
        startedAt: now,
        foundAt: formatTimestamp(now),
    };
}
