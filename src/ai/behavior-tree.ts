import { ChildList, SELECTOR_POLICY, SEQUENCE_POLICY, type ListPolicy } from './child-list';
import { NodeStatus, invertStatus, isTerminal } from './node-status';

export { NodeStatus } from './node-status';

// ─── Abstract Base ────────────────────────────────────────────────────────────

/**
 * Poll-model node. `tick` advances one step against the shared context.
 * After a terminal status the owner calls `reset` before ticking it again.
 */
export abstract class Node<T> {
    abstract tick(ctx: T): NodeStatus;

    /** Rearm internal state after a finished run. Stateless nodes keep the no-op. */
    reset(_lastStatus: NodeStatus): void {}
}

// ─── Composite Nodes ──────────────────────────────────────────────────────────

/** Ordered composite driven by a {@link ListPolicy}. */
export abstract class ListNode<T> extends Node<T> {
    private readonly list: ChildList<Node<T>>;

    protected constructor(children: readonly Node<T>[], policy: ListPolicy) {
        super();
        this.list = new ChildList(children, policy);
    }

    get children(): readonly Node<T>[] {
        return this.list.children;
    }

    /** Index of the child the next tick resumes at */
    get cursor(): number {
        return this.list.current;
    }

    tick(ctx: T): NodeStatus {
        return this.list.advance(child => child.tick(ctx));
    }

    reset(lastStatus: NodeStatus): void {
        this.list.reset(lastStatus);
    }
}

/** Runs children in order until one fails. Succeeds when all children succeed.
 *  A RUNNING child is resumed on the next tick; earlier children are not re-run. */
export class Sequence<T> extends ListNode<T> {
    constructor(children: readonly Node<T>[]) {
        super(children, SEQUENCE_POLICY);
    }
}

/** Tries children in order until one succeeds. Fails only when all children fail. */
export class Selector<T> extends ListNode<T> {
    constructor(children: readonly Node<T>[]) {
        super(children, SELECTOR_POLICY);
    }
}

// ─── Leaf Nodes ───────────────────────────────────────────────────────────────

/** Boolean predicate → SUCCESS or FAILURE. */
export class Condition<T> extends Node<T> {
    constructor(public readonly predicate: (ctx: T) => boolean) {
        super();
    }

    tick(ctx: T): NodeStatus {
        return this.predicate(ctx) ? NodeStatus.SUCCESS : NodeStatus.FAILURE;
    }
}

/** Executes a callback and always returns SUCCESS. */
export class Action<T> extends Node<T> {
    constructor(public readonly execute: (ctx: T) => void) {
        super();
    }

    tick(ctx: T): NodeStatus {
        this.execute(ctx);
        return NodeStatus.SUCCESS;
    }
}

/** Executes a callback that returns an arbitrary NodeStatus. */
export class StatusAction<T> extends Node<T> {
    constructor(public readonly execute: (ctx: T) => NodeStatus) {
        super();
    }

    tick(ctx: T): NodeStatus {
        return this.execute(ctx);
    }
}

// ─── Decorator Nodes ──────────────────────────────────────────────────────────

/** Single-child node. Reset is forwarded to the child unless overridden. */
export abstract class Decorator<T> extends Node<T> {
    constructor(public readonly child: Node<T>) {
        super();
    }

    reset(lastStatus: NodeStatus): void {
        this.child.reset(lastStatus);
    }
}

/** SUCCESS ↔ FAILURE, RUNNING passes through. */
export class Invert<T> extends Decorator<T> {
    tick(ctx: T): NodeStatus {
        return invertStatus(this.child.tick(ctx));
    }
}

/** Any terminal status of the child becomes SUCCESS. */
export class ForceSuccess<T> extends Decorator<T> {
    tick(ctx: T): NodeStatus {
        const status = this.child.tick(ctx);
        return isTerminal(status) ? NodeStatus.SUCCESS : status;
    }
}

/** Any terminal status of the child becomes FAILURE. */
export class ForceFailure<T> extends Decorator<T> {
    tick(ctx: T): NodeStatus {
        const status = this.child.tick(ctx);
        return isTerminal(status) ? NodeStatus.FAILURE : status;
    }
}

/**
 * Runs the child to completion `times` times. Earlier completions are
 * swallowed (child reset, RUNNING returned); the last one is returned as is.
 *
 * The counter starts at 1, so with `times = 1` the node is a pass-through.
 */
export class Repeat<T> extends Decorator<T> {
    private current = 1;

    constructor(
        public readonly times: number,
        child: Node<T>,
    ) {
        super(child);
        if (!Number.isInteger(times) || times < 1) {
            throw new Error(`Repeat count must be an integer >= 1, got ${times}`);
        }
    }

    /** Completion the child is currently working on, starting at 1 */
    get iteration(): number {
        return this.current;
    }

    tick(ctx: T): NodeStatus {
        if (this.current >= this.times) {
            return this.child.tick(ctx);
        }

        const status = this.child.tick(ctx);
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

/**
 * Re-runs the child until `predicate` holds. The predicate is checked once
 * per child completion (and once before the first one); in between the node
 * just reports RUNNING.
 */
export class RepeatUntil<T> extends Decorator<T> {
    private checked = false;

    constructor(
        public readonly predicate: (ctx: T) => boolean,
        child: Node<T>,
    ) {
        super(child);
    }

    tick(ctx: T): NodeStatus {
        const status = this.child.tick(ctx);
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

/** Only runs child if condition is true. Returns FAILURE when condition is
 *  false (child is skipped). Checked on every tick. */
export class RunIf<T> extends Decorator<T> {
    constructor(
        public readonly conditionFn: (ctx: T) => boolean,
        child: Node<T>,
    ) {
        super(child);
    }

    tick(ctx: T): NodeStatus {
        if (!this.conditionFn(ctx)) return NodeStatus.FAILURE;
        return this.child.tick(ctx);
    }
}

// ─── Builder Functions (functional API) ───────────────────────────────────────

export function sequence<T>(...children: [Node<T>, ...Node<T>[]]): Sequence<T> {
    return new Sequence(children);
}

export function selector<T>(...children: [Node<T>, ...Node<T>[]]): Selector<T> {
    return new Selector(children);
}

export function condition<T>(predicate: (ctx: T) => boolean): Condition<T> {
    return new Condition(predicate);
}

export function action<T>(callback: (ctx: T) => void): Action<T> {
    return new Action(callback);
}

export function statusAction<T>(callback: (ctx: T) => NodeStatus): StatusAction<T> {
    return new StatusAction(callback);
}

export function invert<T>(child: Node<T>): Invert<T> {
    return new Invert(child);
}

export function forceSuccess<T>(child: Node<T>): ForceSuccess<T> {
    return new ForceSuccess(child);
}

export function forceFailure<T>(child: Node<T>): ForceFailure<T> {
    return new ForceFailure(child);
}

export function repeat<T>(times: number, child: Node<T>): Repeat<T> {
    return new Repeat(times, child);
}

export function repeatUntil<T>(
    predicate: (ctx: T) => boolean,
    child: Node<T>,
): RepeatUntil<T> {
    return new RepeatUntil(predicate, child);
}

export function runIf<T>(
    conditionFn: (ctx: T) => boolean,
    child: Node<T>,
): RunIf<T> {
    return new RunIf(conditionFn, child);
}
