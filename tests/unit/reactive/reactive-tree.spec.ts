import { describe, it, expect, vi } from 'vitest';
import { NodeStatus } from '@/ai/node-status';
import { MarkerEvent, type TreeEvent } from '@/ai/reactive/event-kind';
import {
    ReactiveSelector,
    ReactiveSequence,
    action,
    condition,
    eventGate,
    forceFailure,
    forceSuccess,
    invert,
    repeat,
    repeatUntil,
    repeatUntilFailure,
    repeatUntilSuccess,
    runIf,
    selector,
    sequence,
    statusAction,
    waitFor,
    type ReactiveNode,
} from '@/ai/reactive/reactive-tree';
import { makeContext, type TestContext } from '../helpers/test-context';

const { SUCCESS, FAILURE, RUNNING } = NodeStatus;

class Ping extends MarkerEvent {}
class Exit extends MarkerEvent {}

const PING = new Ping();
const EXIT = new Exit();

/** React to each event in turn, resetting on a terminal status like a driver would. */
function feed<T>(node: ReactiveNode<T>, events: readonly TreeEvent[], ctx: T): NodeStatus[] {
    return events.map(event => {
        const status = node.react(event, ctx);
        if (status !== RUNNING) node.reset(status);
        return status;
    });
}

// ─── Composites ───────────────────────────────────────────────────────────────

describe('ReactiveSequence', () => {
    it('runs eligible children on one event and waits at a gate', () => {
        const ctx = makeContext();
        const tree = sequence<TestContext>(
            action(c => { c.value += 1; }),
            action(c => { c.value += 1; }),
            waitFor(Exit, action(c => { c.log.push('exit'); })),
        );

        expect(feed(tree, [PING, PING, PING, PING, PING, EXIT], ctx))
            .toEqual([RUNNING, RUNNING, RUNNING, RUNNING, RUNNING, SUCCESS]);
        expect(ctx.value).toBe(2);
        expect(ctx.log).toEqual(['exit']);
    });

    it('never offers a non-matching event past a gate', () => {
        const ctx = makeContext();
        const tree = sequence<TestContext>(
            action(c => { c.log.push('a'); }),
            waitFor(Exit, action(c => { c.log.push('b'); })),
            action(c => { c.log.push('c'); }),
        );

        expect(tree.react(PING, ctx)).toBe(RUNNING);
        expect(tree.cursor).toBe(1);
        expect(tree.react(PING, ctx)).toBe(RUNNING);
        expect(ctx.log).toEqual(['a']);

        expect(tree.react(EXIT, ctx)).toBe(SUCCESS);
        expect(ctx.log).toEqual(['a', 'b', 'c']);
        expect(tree.cursor).toBe(0);
    });

    it('fails on the first failing child', () => {
        const ctx = makeContext();
        const tree = sequence<TestContext>(
            condition(() => false),
            action(c => { c.log.push('never'); }),
        );

        expect(tree.react(PING, ctx)).toBe(FAILURE);
        expect(ctx.log).toEqual([]);
    });

    it('accepts every kind, even while waiting on a gate', () => {
        const tree = sequence<TestContext>(waitFor(Exit, action(() => {})));
        expect(tree.interestedIn(Ping.kind)).toBe(true);
    });

    it('rejects an empty child list', () => {
        expect(() => new ReactiveSequence<TestContext>([])).toThrow('Sequence requires at least one child');
    });
});

describe('ReactiveSelector', () => {
    it('keeps its place behind a gate until the awaited kind arrives', () => {
        const ctx = makeContext();
        const tree = selector<TestContext>(
            condition(() => false),
            waitFor(Exit, action(c => { c.log.push('x'); })),
        );

        expect(tree.react(PING, ctx)).toBe(RUNNING);
        expect(tree.react(EXIT, ctx)).toBe(SUCCESS);
        expect(ctx.log).toEqual(['x']);
    });

    it('fails when every child fails', () => {
        const tree = selector<TestContext>(condition(() => false), condition(() => false));
        expect(tree.react(PING, makeContext())).toBe(FAILURE);
    });

    it('rejects an empty child list', () => {
        expect(() => new ReactiveSelector<TestContext>([])).toThrow('Selector requires at least one child');
    });
});

// ─── EventGate ────────────────────────────────────────────────────────────────

describe('EventGate', () => {
    it('only accepts its own kind', () => {
        const gate = eventGate<TestContext>(Exit.kind, action(() => {}));

        expect(gate.interestedIn(Exit.kind)).toBe(true);
        expect(gate.interestedIn(Ping.kind)).toBe(false);
    });

    it('never lets another kind reach its child or later siblings', () => {
        const guarded = vi.fn(() => SUCCESS);
        const after = vi.fn();
        const tree = sequence<TestContext>(
            eventGate(Exit.kind, statusAction(guarded)),
            action(after),
        );
        const ctx = makeContext();

        feed(tree, [PING, PING, PING], ctx);

        expect(guarded).not.toHaveBeenCalled();
        expect(after).not.toHaveBeenCalled();
    });
});

// ─── Decorators ───────────────────────────────────────────────────────────────

describe('reactive status decorators', () => {
    it('invert swaps terminal statuses', () => {
        expect(invert(condition<TestContext>(() => true)).react(PING, makeContext())).toBe(FAILURE);
        expect(invert(statusAction<TestContext>(() => RUNNING)).react(PING, makeContext())).toBe(RUNNING);
    });

    it('forceSuccess and forceFailure fix the terminal status', () => {
        expect(forceSuccess(condition<TestContext>(() => false)).react(PING, makeContext())).toBe(SUCCESS);
        expect(forceFailure(action<TestContext>(() => {})).react(PING, makeContext())).toBe(FAILURE);
    });

    it('forward interest to the child', () => {
        const gated = waitFor(Exit, action<TestContext>(() => {}));

        for (const node of [invert(gated), forceSuccess(gated), repeatUntilSuccess(gated), repeat(2, gated)]) {
            expect(node.interestedIn(Ping.kind)).toBe(false);
            expect(node.interestedIn(Exit.kind)).toBe(true);
        }
    });

    it('runIf fails without running the child when the condition is false', () => {
        const ctx = makeContext({ flag: false });
        const tree = runIf<TestContext>(c => c.flag, action(c => { c.value = 1; }));

        expect(tree.react(PING, ctx)).toBe(FAILURE);
        expect(ctx.value).toBe(0);
    });
});

describe('reactive Repeat', () => {
    it('needs one event per completion', () => {
        const ctx = makeContext();
        const tree = repeat<TestContext>(3, action(c => { c.value++; }));

        expect(feed(tree, [PING, PING, PING], ctx)).toEqual([RUNNING, RUNNING, SUCCESS]);
        expect(ctx.value).toBe(3);
    });

    it('rejects a count below one', () => {
        expect(() => repeat<TestContext>(0, action(() => {}))).toThrow('Repeat count must be an integer >= 1, got 0');
    });
});

describe('reactive RepeatUntil', () => {
    it('succeeds once the predicate holds after a completion', () => {
        const ctx = makeContext({ value: 2 });
        const tree = repeatUntil<TestContext>(c => c.value === 0, action(c => { c.value--; }));

        expect(feed(tree, [PING, PING], ctx)).toEqual([RUNNING, SUCCESS]);
    });
});

describe('RepeatUntilSuccess', () => {
    it('swallows failures and retries on later events', () => {
        const ctx = makeContext();
        const tree = repeatUntilSuccess(sequence<TestContext>(
            action(c => { c.value++; }),
            condition(c => c.value >= 3),
        ));

        expect(feed(tree, [PING, PING, PING], ctx)).toEqual([RUNNING, RUNNING, SUCCESS]);
        expect(ctx.value).toBe(3);
    });
});

describe('RepeatUntilFailure', () => {
    it('swallows successes and retries on later events', () => {
        const ctx = makeContext();
        const tree = repeatUntilFailure(sequence<TestContext>(
            action(c => { c.value++; }),
            condition(c => c.value < 3),
        ));

        expect(feed(tree, [PING, PING, PING], ctx)).toEqual([RUNNING, RUNNING, FAILURE]);
        expect(ctx.value).toBe(3);
    });
});
