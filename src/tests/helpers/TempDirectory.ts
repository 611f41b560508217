import { mkdtemp, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';

export async function createTempDirectory(): Promise<string> {
    return mkdtemp(join(tmpdir(), 'petlog-test-'));
}

export async function removeTempDirectory(path: string): Promise<void> {
    await rm(path, { recursive: true, force: true });
}

/**
 * Clock that advances one minute per reading, starting at `start`.
 */
export function steppingClock(start: Date, stepMs = 60_000): () => Date {
    let readings = 0;
    return () => new Date(start.getTime() + stepMs * readings++);
}

/**
 * Deterministic ids: "id-1", "id-2", ...
 */
export function sequentialIds(prefix = 'id'): () => string {
    let counter = 0;
    return () => `${prefix}-${++counter}`;
}
