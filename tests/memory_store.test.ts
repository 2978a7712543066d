/**
 * Memory Store Tests
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Capacity-bounded curation, relevance retrieval, summaries and persistence.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import fs from 'fs';
import os from 'os';
import path from 'path';
import {
    InMemoryPersistence,
    JsonFileMemoryPersistence,
    MemoryPersistence,
    MemoryStore,
    computeCurationScore,
    parseMemoryRecords,
} from '../src/memory';
import { constantRandom } from './fixtures';

const T0 = Date.parse('2026-01-01T00:00:00.000Z');
const DAY_MS = 86_400_000;

function createStore(maxMemories: number, clock: () => number = () => T0, random = constantRandom(0.5)) {
    return new MemoryStore('retail', { config: { maxMemories }, clock, random });
}

describe('MemoryStore', () => {
    describe('add and curate', () => {
        test('keeps the highest importance memories once capacity is exceeded', () => {
            const store = createStore(3);
            store.add('a', 0.2);
            store.add('b', 0.9);
            store.add('c', 0.5);
            store.add('d', 0.7);

            expect(store.size).toBe(3);
            expect(store.list().map((m) => m.content)).toEqual(['b', 'd', 'c']);
        });

        test('re-curating without new memories keeps the same members', () => {
            let now = T0;
            const store = createStore(3, () => now);
            const importances = [0.2, 0.9, 0.5, 0.7, 0.6];

            importances.forEach((importance, i) => {
                now = T0 + i * 1000;
                store.add(`m${i}`, importance);
            });
            expect(store.list().map((m) => m.content)).toEqual(['m1', 'm3', 'm4']);

            now = T0 + DAY_MS;
            store.curate();
            expect(store.list().map((m) => m.content)).toEqual(['m1', 'm3', 'm4']);
        });

        test('age decay lets fresher memories displace an older important one', () => {
            let now = T0;
            const store = createStore(2, () => now);

            store.add('old', 0.8);
            now = T0 + DAY_MS;
            store.add('fresh', 0.5);
            store.add('fresher', 0.45);

            expect(store.list().map((m) => m.content)).toEqual(['fresh', 'fresher']);
        });

        test('clamps importance and stamps the clock time', () => {
            const store = createStore(10);
            const memory = store.add('x', 1.7);

            expect(memory.importance).toBe(1);
            expect(memory.references).toBe(0);
            expect(memory.timestamp).toBe('2026-01-01T00:00:00.000Z');
        });

        test('curation score doubles after ten references', () => {
            const memory = { content: 'x', importance: 0.4, timestamp: new Date(T0).toISOString(), references: 10 };
            expect(computeCurationScore(memory, T0)).toBeCloseTo(0.8, 10);
        });
    });

    describe('retrieve', () => {
        test('ranks strike mentions first and counts every relevant memory', () => {
            const store = createStore(10);
            store.add('Hit call strike 630 at spot 628', 0.7);
            store.add('Missed put strike 615', 0.5);

            const result = store.retrieve({ strikePrice: 630 }, 1);

            expect(result).toHaveLength(1);
            expect(result[0].content).toBe('Hit call strike 630 at spot 628');
            expect(result[0].references).toBe(1);
            expect(store.list().map((m) => m.references)).toEqual([1, 1]);
        });

        test('limit 0 returns nothing but still counts references', () => {
            const store = createStore(10);
            store.add('Missed put strike 615', 0.5);

            expect(store.retrieve({}, 0)).toEqual([]);
            expect(store.list()[0].references).toBe(1);
        });

        test('zero relevance leaves references untouched', () => {
            const store = createStore(10, () => T0, constantRandom(0));
            store.add('Missed put strike 615', 0.5);

            expect(store.retrieve({ strikePrice: 630, recentSuccess: true })).toEqual([]);
            expect(store.list()[0].references).toBe(0);
        });

        test('failure keyword aligns with a losing streak', () => {
            const store = createStore(10, () => T0, constantRandom(0));
            store.add('Failed to defend call strike 630', 0.6);
            store.add('Successfully defended call strike 625', 0.8);

            const result = store.retrieve({ recentSuccess: false });
            expect(result.map((m) => m.content)).toEqual(['Failed to defend call strike 630']);
        });
    });

    describe('summarize', () => {
        test('empty store', () => {
            expect(createStore(10).summarize()).toBe('No memories collected yet.');
        });

        test('groups by importance', () => {
            const store = new MemoryStore('monkey', { clock: () => T0, random: constantRandom(0.5) });
            store.add('Successfully defended call strike 630', 0.8);
            store.add('Failed to defend call strike 625', 0.6);
            store.add('noise', 0.1);

            expect(store.summarize()).toBe(
                'Agent monkey Insights:\n' +
                '\nKey Learnings:\n' +
                '- Successfully defended call strike 630 (referenced 0 times)\n' +
                '\nUseful Patterns:\n' +
                '- Failed to defend call strike 625'
            );
        });
    });

    describe('persistence', () => {
        test('reloads what a previous store saved', () => {
            const persistence = new InMemoryPersistence();
            const first = new MemoryStore('retail', { persistence, clock: () => T0 });
            first.add('Hit call strike 630 at spot 628', 0.7);

            const second = new MemoryStore('retail', { persistence, clock: () => T0 });
            expect(second.list().map((m) => m.content)).toEqual(['Hit call strike 630 at spot 628']);
        });

        test('load and save failures are swallowed', () => {
            const broken: MemoryPersistence = {
                load: () => {
                    throw new Error('disk gone');
                },
                save: () => {
                    throw new Error('disk gone');
                },
            };

            const store = new MemoryStore('retail', { persistence: broken });
            expect(store.size).toBe(0);
            expect(() => store.add('still works', 0.5)).not.toThrow();
            expect(store.size).toBe(1);
        });

        test('json file round trip and malformed file recovery', () => {
            const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'memories-'));
            try {
                const persistence = new JsonFileMemoryPersistence(dir);
                const store = new MemoryStore('retail', { persistence, clock: () => T0 });
                store.add('Missed call strike 630', 0.5);

                const saved = parseMemoryRecords(fs.readFileSync(persistence.filePath('retail'), 'utf8'));
                expect(saved).toEqual([
                    { content: 'Missed call strike 630', importance: 0.5, timestamp: '2026-01-01T00:00:00.000Z', references: 0 },
                ]);

                fs.writeFileSync(persistence.filePath('monkey'), '{"not": "a list"}', 'utf8');
                const monkey = new MemoryStore('monkey', { persistence });
                expect(monkey.size).toBe(0);
            } finally {
                fs.rmSync(dir, { recursive: true, force: true });
            }
        });

        test('persisted importance is clamped into [0, 1]', () => {
            const records = parseMemoryRecords(
                '[{"content":"a","importance":1.5,"timestamp":"2026-01-01T00:00:00.000Z","references":0},' +
                '{"content":"b","importance":-0.2,"timestamp":"2026-01-01T00:00:00.000Z","references":0}]'
            );
            expect(records.map((m) => m.importance)).toEqual([1, 0]);
        });

        test('missing references default to zero', () => {
            const records = parseMemoryRecords('[{"content":"x","importance":0.5,"timestamp":"2026-01-01T00:00:00.000Z"}]');
            expect(records[0].references).toBe(0);
        });
    });
});
