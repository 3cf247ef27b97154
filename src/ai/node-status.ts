// ─── Node Status ──────────────────────────────────────────────────────────────

/** Outcome of a single tick/react call. RUNNING means "call me again". */
export enum NodeStatus {
    SUCCESS,
    FAILURE,
    RUNNING,
}

/** SUCCESS and FAILURE end a run; the node must be reset before it is ticked again. */
export function isTerminal(status: NodeStatus): boolean {
    return status !== NodeStatus.RUNNING;
}

/** Swap SUCCESS and FAILURE, leave RUNNING alone. */
export function invertStatus(status: NodeStatus): NodeStatus {
    switch (status) {
    case NodeStatus.SUCCESS:
        return NodeStatus.FAILURE;
    case NodeStatus.FAILURE:
        return NodeStatus.SUCCESS;
    case NodeStatus.RUNNING:
        return NodeStatus.RUNNING;
    }
}
