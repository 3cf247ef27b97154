import { describe, it, expect, vi } from 'vitest';
import { EventKind } from '@/ai/reactive/event-kind';

// Every name hashes to the same digest, so the second name collides.
vi.mock('@noble/hashes/sha256', () => ({
    sha256: () => new Uint8Array(32),
}));

describe('EventKind fingerprint collisions', () => {
    it('throws instead of merging two names into one kind', () => {
        const first = EventKind.of('Alpha');

        expect(first.fingerprint).toBe(0n);
        expect(() => EventKind.of('Beta')).toThrow(
            'Event kind fingerprint collision: "Beta" and "Alpha" both hash to 0000000000000000',
        );
    });

    it('still returns the cached kind for the first name', () => {
        expect(EventKind.of('Alpha')).toBe(EventKind.of('Alpha'));
    });
});
