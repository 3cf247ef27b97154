import { sha256 } from '@noble/hashes/sha256';
import { utf8ToBytes } from '@noble/hashes/utils';

/**
 * 64-bit fingerprint of an event's logical type.
 *
 * The value is the first 8 bytes of SHA-256 over the canonical name. It is a
 * fingerprint, not a proof of identity: two names could in principle share
 * one. The registry below remembers which name owns each fingerprint and
 * throws when a second name lands on an owned value, so a collision surfaces
 * at the first `EventKind.of` call instead of silently merging two kinds.
 */
export class EventKind {
    private static readonly byName = new Map<string, EventKind>();
    private static readonly byFingerprint = new Map<bigint, EventKind>();

    private constructor(
        public readonly name: string,
        public readonly fingerprint: bigint,
    ) {}

    /** Kind for a canonical event name. Cached; the same name always yields the same instance. */
    static of(name: string): EventKind {
        const cached = EventKind.byName.get(name);
        if (cached) return cached;

        const fingerprint = fingerprintOf(name);
        const owner = EventKind.byFingerprint.get(fingerprint);
        if (owner) {
            throw new Error(
                `Event kind fingerprint collision: "${name}" and "${owner.name}" both hash to ${formatFingerprint(fingerprint)}`,
            );
        }

        const kind = new EventKind(name, fingerprint);
        EventKind.byName.set(name, kind);
        EventKind.byFingerprint.set(fingerprint, kind);
        return kind;
    }

    equals(other: EventKind): boolean {
        return this.fingerprint === other.fingerprint;
    }

    toString(): string {
        return `${this.name}#${formatFingerprint(this.fingerprint)}`;
    }
}

/** First 8 bytes of SHA-256(name), big-endian. */
export function fingerprintOf(name: string): bigint {
    const digest = sha256(utf8ToBytes(name));
    let value = 0n;
    for (let i = 0; i < 8; i++) {
        value = (value << 8n) | BigInt(digest[i]);
    }
    return value;
}

function formatFingerprint(fingerprint: bigint): string {
    return fingerprint.toString(16).padStart(16, '0');
}

// ─── Events ───────────────────────────────────────────────────────────────────

/**
 * Anything that can be dispatched into a reactive tree.
 * `eventName` identifies the logical kind; for enum-like events each variant
 * returns its own name (e.g. `'Key.Up'`, `'Key.Down'`).
 */
export interface TreeEvent {
    readonly eventName: string;
}

/** Something that names a kind statically, e.g. a {@link MarkerEvent} subclass. */
export interface EventType {
    readonly kind: EventKind;
}

export function kindOf(event: TreeEvent): EventKind {
    return EventKind.of(event.eventName);
}

const markerKinds = new WeakMap<Function, EventKind>();
const markerOwners = new Map<string, Function>();

/** Kind of a marker class, registered to that class on first use. */
function markerKind(type: Function): EventKind {
    const cached = markerKinds.get(type);
    if (cached) return cached;

    const declared: unknown = Object.getOwnPropertyDescriptor(type, 'eventName')?.value;
    const name = typeof declared === 'string' ? declared : type.name;
    if (name === '') {
        throw new Error('Marker event class has no name: declare it with a class name or a static eventName');
    }

    const owner = markerOwners.get(name);
    if (owner !== undefined && owner !== type) {
        throw new Error(
            `Marker event name "${name}" is already used by another class; give one of them a static eventName`,
        );
    }

    const kind = EventKind.of(name);
    markerOwners.set(name, type);
    markerKinds.set(type, kind);
    return kind;
}

/**
 * Base for payload-free event types. The kind comes from the class name, or
 * from a static `eventName` when two classes would otherwise share a name:
 *
 *     class Exit extends MarkerEvent {}
 *     new Exit().eventName; // 'Exit'
 *     Exit.kind;            // EventKind.of('Exit')
 *
 *     class MenuExit extends MarkerEvent { static readonly eventName = 'Menu.Exit'; }
 *
 * Each name belongs to one class. A second class resolving to a taken name,
 * or an anonymous class, throws on first use.
 */
export abstract class MarkerEvent implements TreeEvent {
    get eventName(): string {
        return markerKind(this.constructor).name;
    }

    static get kind(): EventKind {
        return markerKind(this);
    }
}

/** Generic pulse for trees that do not wait on any particular kind. */
export class TickEvent extends MarkerEvent {}

const TICK = new TickEvent();

/** Endless stream of {@link TickEvent}s. */
export function* tickEvents(): Generator<TickEvent, never, undefined> {
    for (;;) {
        yield TICK;
    }
}
