import { NodeStatus, type Node } from './behavior-tree';
import { isTerminal } from './node-status';
import { resolveSettings, type BehaviorTreeSettings } from './settings';
import { LogHandler } from '@/utilities/log-handler';

const log = new LogHandler('Tick');

/**
 * Execution context that wraps a context value and a behavior tree root node.
 * Resets the root after every finished run so the tree can be run again.
 */
export class Tick<T> {
    private readonly ctx: T;
    private readonly rootNode: Node<T>;
    private readonly settings: BehaviorTreeSettings;
    private ticks = 0;

    constructor(ctx: T, rootNode: Node<T>, settings: Partial<BehaviorTreeSettings> = {}) {
        this.ctx = ctx;
        this.rootNode = rootNode;
        this.settings = resolveSettings(settings);
    }

    /** Ticks spent in the current run */
    get ticksInRun(): number {
        return this.ticks;
    }

    /** Run one tick of the behavior tree. */
    tick(): NodeStatus {
        const status = this.rootNode.tick(this.ctx);
        this.ticks++;

        if (this.settings.verbose) {
            log.debug(`tick ${this.ticks}: ${NodeStatus[status]}`);
        }

        if (isTerminal(status)) {
            this.rootNode.reset(status);
            if (this.settings.verbose) {
                log.debug(`run finished with ${NodeStatus[status]} after ${this.ticks} tick(s)`);
            }
            this.ticks = 0;
        }
        return status;
    }

    /**
     * Tick until the root reports SUCCESS (true) or FAILURE (false).
     * Busy-loops: only use with trees whose steps make progress on their own.
     */
    run(): boolean {
        for (;;) {
            if (this.ticks >= this.settings.maxTicks) {
                const spent = this.ticks;
                this.rootNode.reset(NodeStatus.FAILURE);
                this.ticks = 0;
                const error = new Error(`Behavior tree still RUNNING after ${spent} tick(s) (maxTicks)`);
                log.error('tick budget exhausted', error);
                throw error;
            }

            const status = this.tick();
            if (status === NodeStatus.SUCCESS) return true;
            if (status === NodeStatus.FAILURE) return false;
        }
    }
}

/** Run `root` against `ctx` to completion. */
export function run<T>(root: Node<T>, ctx: T, settings: Partial<BehaviorTreeSettings> = {}): boolean {
    return new Tick(ctx, root, settings).run();
}
