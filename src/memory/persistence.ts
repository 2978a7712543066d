/**
 * Agent Memory - Persistence
 *
 * Memories are stored per agent as an ordered JSON array of
 * { content, importance, timestamp, references } records, overwritten on
 * every write.
 */

import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { Memory, MemoryPersistence } from './types';

const memoryRecordSchema = z.object({
    content: z.string(),
    importance: z.number().transform((v) => Math.max(0, Math.min(1, v))),
    timestamp: z.string(),
    references: z.number().int().nonnegative().default(0),
});

const memoryFileSchema = z.array(memoryRecordSchema);

/**
 * Parse a persisted memory file body.
 *
 * @throws Error if the body is not valid JSON or not a memory array
 */
export function parseMemoryRecords(body: string): Memory[] {
    const parsed = memoryFileSchema.safeParse(JSON.parse(body));
    if (!parsed.success) {
        const first = parsed.error.issues[0];
        throw new Error(`Malformed memory file at ${first.path.join('.')}: ${first.message}`);
    }
    return parsed.data;
}

/**
 * File-backed persistence: `<dir>/<agent>_memories.json`
 */
export class JsonFileMemoryPersistence implements MemoryPersistence {
    constructor(private readonly dir: string) {}

    filePath(agentName: string): string {
        return path.join(this.dir, `${agentName}_memories.json`);
    }

    load(agentName: string): Memory[] {
        const file = this.filePath(agentName);
        if (!fs.existsSync(file)) return [];
        return parseMemoryRecords(fs.readFileSync(file, 'utf8'));
    }

    save(agentName: string, memories: readonly Memory[]): void {
        fs.mkdirSync(this.dir, { recursive: true });
        fs.writeFileSync(this.filePath(agentName), JSON.stringify(memories, null, 2), 'utf8');
    }
}

/**
 * Process-local persistence, used in tests and when persistence is disabled
 */
export class InMemoryPersistence implements MemoryPersistence {
    private readonly store = new Map<string, Memory[]>();

    load(agentName: string): Memory[] {
        return (this.store.get(agentName) ?? []).map((m) => ({ ...m }));
    }

    save(agentName: string, memories: readonly Memory[]): void {
        this.store.set(agentName, memories.map((m) => ({ ...m })));
    }
}
