import { NodeStatus } from './node-status';

/**
 * Continuation rule of an ordered composite.
 *  - Sequence keeps going on SUCCESS and stops on FAILURE.
 *  - Selector keeps going on FAILURE and stops on SUCCESS.
 */
export interface ListPolicy {
    readonly name: string;
    /** Moves the cursor to the next child within the same call */
    readonly proceedOn: NodeStatus;
    /** Ends the run early */
    readonly stopOn: NodeStatus;
}

export const SEQUENCE_POLICY: ListPolicy = {
    name: 'Sequence',
    proceedOn: NodeStatus.SUCCESS,
    stopOn: NodeStatus.FAILURE,
};

export const SELECTOR_POLICY: ListPolicy = {
    name: 'Selector',
    proceedOn: NodeStatus.FAILURE,
    stopOn: NodeStatus.SUCCESS,
};

export interface Resettable {
    reset(lastStatus: NodeStatus): void;
}

/**
 * Visits `child` for the current input. Returns `undefined` when the child
 * may not be offered this input; the list then waits on it.
 */
export type ChildVisitor<N> = (child: N) => NodeStatus | undefined;

/**
 * Ordered child list with a resumption cursor, shared by the poll and the
 * reactive composites.
 *
 * Between calls the cursor points at the child that returned RUNNING (or
 * was not eligible). When a run ends, either by the stop status or by
 * walking off the end of the list, every visited child is reset and the
 * cursor goes back to 0. A list with no visited child ignores `reset`, so
 * an owner resetting a list that already finished does not reset twice.
 */
export class ChildList<N extends Resettable> {
    private cursor = 0;
    /** Highest index visited in the current run, -1 before the first visit */
    private visited = -1;

    constructor(
        public readonly children: readonly N[],
        public readonly policy: ListPolicy,
    ) {
        if (children.length === 0) {
            throw new Error(`${policy.name} requires at least one child`);
        }
    }

    /** Index of the child the next call resumes at */
    get current(): number {
        return this.cursor;
    }

    advance(visit: ChildVisitor<N>): NodeStatus {
        while (this.cursor < this.children.length) {
            const status = visit(this.children[this.cursor]);
            if (status === undefined) return NodeStatus.RUNNING;

            this.visited = this.cursor;
            if (status === NodeStatus.RUNNING) {
                return NodeStatus.RUNNING;
            }
            if (status === this.policy.stopOn) {
                this.reset(status);
                return status;
            }
            this.cursor++;
        }

        this.reset(this.policy.proceedOn);
        return this.policy.proceedOn;
    }

    /** Resets every child visited in this run and rewinds the cursor. */
    reset(lastStatus: NodeStatus): void {
        for (let i = 0; i <= this.visited; i++) {
            this.children[i].reset(i < this.cursor ? this.policy.proceedOn : lastStatus);
        }
        this.visited = -1;
        this.cursor = 0;
    }
}
