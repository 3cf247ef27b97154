import { ChildList, SELECTOR_POLICY, SEQUENCE_POLICY, type ListPolicy } from '../child-list';
import { NodeStatus, invertStatus, isTerminal } from '../node-status';
import { EventKind, kindOf, type EventType, type TreeEvent } from './event-kind';

// ─── Abstract Base ────────────────────────────────────────────────────────────

/**
 * Reactive-model node: consumes one external event per call instead of
 * being polled. `interestedIn` lets a node opt out of event kinds; a list
 * stops offering an event at the first child that is not interested.
 */
export abstract class ReactiveNode<T> {
    interestedIn(_kind: EventKind): boolean {
        return true;
    }

    abstract react(event: TreeEvent, ctx: T): NodeStatus;

    reset(_lastStatus: NodeStatus): void {}
}

// ─── Composite Nodes ──────────────────────────────────────────────────────────

/**
 * Ordered composite over reactive children.
 *
 * Each event is offered from the cursor forward, stopping at the first child
 * not interested in its kind. The list then waits there (RUNNING) until an
 * event of a kind that child accepts arrives. Composites themselves accept
 * every kind.
 */
export abstract class ReactiveListNode<T> extends ReactiveNode<T> {
    private readonly list: ChildList<ReactiveNode<T>>;

    protected constructor(children: readonly ReactiveNode<T>[], policy: ListPolicy) {
        super();
        this.list = new ChildList(children, policy);
    }

    get children(): readonly ReactiveNode<T>[] {
        return this.list.children;
    }

    get cursor(): number {
        return this.list.current;
    }

    react(event: TreeEvent, ctx: T): NodeStatus {
        const kind = kindOf(event);
        return this.list.advance(child =>
            child.interestedIn(kind) ? child.react(event, ctx) : undefined,
        );
    }

    reset(lastStatus: NodeStatus): void {
        this.list.reset(lastStatus);
    }
}

export class ReactiveSequence<T> extends ReactiveListNode<T> {
    constructor(children: readonly ReactiveNode<T>[]) {
        super(children, SEQUENCE_POLICY);
    }
}

export class ReactiveSelector<T> extends ReactiveListNode<T> {
    constructor(children: readonly ReactiveNode<T>[]) {
        super(children, SELECTOR_POLICY);
    }
}

// ─── Leaf Nodes ───────────────────────────────────────────────────────────────

export class ReactiveCondition<T> extends ReactiveNode<T> {
    constructor(public readonly predicate: (ctx: T) => boolean) {
        super();
    }

    react(_event: TreeEvent, ctx: T): NodeStatus {
        return this.predicate(ctx) ? NodeStatus.SUCCESS : NodeStatus.FAILURE;
    }
}

export class ReactiveAction<T> extends ReactiveNode<T> {
    constructor(public readonly execute: (ctx: T) => void) {
        super();
    }

    react(_event: TreeEvent, ctx: T): NodeStatus {
        this.execute(ctx);
        return NodeStatus.SUCCESS;
    }
}

export class ReactiveStatusAction<T> extends ReactiveNode<T> {
    constructor(public readonly execute: (ctx: T) => NodeStatus) {
        super();
    }

    react(_event: TreeEvent, ctx: T): NodeStatus {
        return this.execute(ctx);
    }
}

// ─── Decorator Nodes ──────────────────────────────────────────────────────────

/** Single-child node forwarding interest and reset to its child. */
export abstract class ReactiveDecorator<T> extends ReactiveNode<T> {
    constructor(public readonly child: ReactiveNode<T>) {
        super();
    }

    interestedIn(kind: EventKind): boolean {
        return this.child.interestedIn(kind);
    }

    reset(lastStatus: NodeStatus): void {
        this.child.reset(lastStatus);
    }
}

export class ReactiveInvert<T> extends ReactiveDecorator<T> {
    react(event: TreeEvent, ctx: T): NodeStatus {
        return invertStatus(this.child.react(event, ctx));
    }
}

export class ReactiveForceSuccess<T> extends ReactiveDecorator<T> {
    react(event: TreeEvent, ctx: T): NodeStatus {
        const status = this.child.react(event, ctx);
        return isTerminal(status) ? NodeStatus.SUCCESS : status;
    }
}

export class ReactiveForceFailure<T> extends ReactiveDecorator<T> {
    react(event: TreeEvent, ctx: T): NodeStatus {
        const status = this.child.react(event, ctx);
        return isTerminal(status) ? NodeStatus.FAILURE : status;
    }
}

/** Same counting as the poll `Repeat`: one child completion per event at most. */
export class ReactiveRepeat<T> extends ReactiveDecorator<T> {
    private current = 1;

    constructor(
        public readonly times: number,
        child: ReactiveNode<T>,
    ) {
        super(child);
        if (!Number.isInteger(times) || times < 1) {
            throw new Error(`Repeat count must be an integer >= 1, got ${times}`);
        }
    }

    react(event: TreeEvent, ctx: T): NodeStatus {
        if (this.current >= this.times) {
            return this.child.react(event, ctx);
        }

        const status = this.child.react(event, ctx);
        if (isTerminal(status)) {
            this.child.reset(status);
            this.current++;
        }
        return NodeStatus.RUNNING;
    }

    reset(lastStatus: NodeStatus): void {
        this.child.reset(lastStatus);
        this.current = 1;
    }
}

export class ReactiveRepeatUntil<T> extends ReactiveDecorator<T> {
    private checked = false;

    constructor(
        public readonly predicate: (ctx: T) => boolean,
        child: ReactiveNode<T>,
    ) {
        super(child);
    }

    react(event: TreeEvent, ctx: T): NodeStatus {
        const status = this.child.react(event, ctx);
        if (isTerminal(status)) {
            this.child.reset(status);
            this.checked = false;
        }

        if (!this.checked) {
            if (this.predicate(ctx)) return NodeStatus.SUCCESS;
            this.checked = true;
        }
        return NodeStatus.RUNNING;
    }

    reset(lastStatus: NodeStatus): void {
        this.child.reset(lastStatus);
        this.checked = false;
    }
}

export class ReactiveRunIf<T> extends ReactiveDecorator<T> {
    constructor(
        public readonly conditionFn: (ctx: T) => boolean,
        child: ReactiveNode<T>,
    ) {
        super(child);
    }

    react(event: TreeEvent, ctx: T): NodeStatus {
        if (!this.conditionFn(ctx)) return NodeStatus.FAILURE;
        return this.child.react(event, ctx);
    }
}

/** Retries the child on later events until it succeeds. FAILURE is swallowed. */
export class RepeatUntilSuccess<T> extends ReactiveDecorator<T> {
    react(event: TreeEvent, ctx: T): NodeStatus {
        const status = this.child.react(event, ctx);
        if (status === NodeStatus.SUCCESS) return status;
        if (status === NodeStatus.FAILURE) this.child.reset(status);
        return NodeStatus.RUNNING;
    }
}

/** Retries the child on later events until it fails. SUCCESS is swallowed. */
export class RepeatUntilFailure<T> extends ReactiveDecorator<T> {
    react(event: TreeEvent, ctx: T): NodeStatus {
        const status = this.child.react(event, ctx);
        if (status === NodeStatus.FAILURE) return status;
        if (status === NodeStatus.SUCCESS) this.child.reset(status);
        return NodeStatus.RUNNING;
    }
}

/**
 * Only accepts events of one kind and hands them to the child. Inside a list
 * it also holds back every later sibling until such an event arrives.
 */
export class EventGate<T> extends ReactiveDecorator<T> {
    constructor(
        public readonly kind: EventKind,
        child: ReactiveNode<T>,
    ) {
        super(child);
    }

    interestedIn(kind: EventKind): boolean {
        return this.kind.equals(kind);
    }

    react(event: TreeEvent, ctx: T): NodeStatus {
        return this.child.react(event, ctx);
    }
}

// ─── Builder Functions (functional API) ───────────────────────────────────────

export function sequence<T>(...children: [ReactiveNode<T>, ...ReactiveNode<T>[]]): ReactiveSequence<T> {
    return new ReactiveSequence(children);
}

export function selector<T>(...children: [ReactiveNode<T>, ...ReactiveNode<T>[]]): ReactiveSelector<T> {
    return new ReactiveSelector(children);
}

export function condition<T>(predicate: (ctx: T) => boolean): ReactiveCondition<T> {
    return new ReactiveCondition(predicate);
}

export function action<T>(callback: (ctx: T) => void): ReactiveAction<T> {
    return new ReactiveAction(callback);
}

export function statusAction<T>(callback: (ctx: T) => NodeStatus): ReactiveStatusAction<T> {
    return new ReactiveStatusAction(callback);
}

export function invert<T>(child: ReactiveNode<T>): ReactiveInvert<T> {
    return new ReactiveInvert(child);
}

export function forceSuccess<T>(child: ReactiveNode<T>): ReactiveForceSuccess<T> {
    return new ReactiveForceSuccess(child);
}

export function forceFailure<T>(child: ReactiveNode<T>): ReactiveForceFailure<T> {
    return new ReactiveForceFailure(child);
}

export function repeat<T>(times: number, child: ReactiveNode<T>): ReactiveRepeat<T> {
    return new ReactiveRepeat(times, child);
}

export function repeatUntil<T>(
    predicate: (ctx: T) => boolean,
    child: ReactiveNode<T>,
): ReactiveRepeatUntil<T> {
    return new ReactiveRepeatUntil(predicate, child);
}

export function runIf<T>(
    conditionFn: (ctx: T) => boolean,
    child: ReactiveNode<T>,
): ReactiveRunIf<T> {
    return new ReactiveRunIf(conditionFn, child);
}

export function repeatUntilSuccess<T>(child: ReactiveNode<T>): RepeatUntilSuccess<T> {
    return new RepeatUntilSuccess(child);
}

export function repeatUntilFailure<T>(child: ReactiveNode<T>): RepeatUntilFailure<T> {
    return new RepeatUntilFailure(child);
}

export function eventGate<T>(kind: EventKind, child: ReactiveNode<T>): EventGate<T> {
    return new EventGate(kind, child);
}

/** `eventGate` keyed by an event type, e.g. `waitFor(Exit, action(...))`. */
export function waitFor<T>(type: EventType, child: ReactiveNode<T>): EventGate<T> {
    return new EventGate(type.kind, child);
}
