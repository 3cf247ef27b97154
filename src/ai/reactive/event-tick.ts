import { NodeStatus, isTerminal } from '../node-status';
import { resolveSettings, type BehaviorTreeSettings } from '../settings';
import { kindOf, type TreeEvent } from './event-kind';
import type { ReactiveNode } from './reactive-tree';
import { LogHandler } from '@/utilities/log-handler';

const log = new LogHandler('EventTick');

/**
 * Feeds events into a reactive root one at a time.
 * RUNNING from {@link EventTick.run} means "no verdict yet".
 */
export class EventTick<T> {
    private readonly ctx: T;
    private readonly rootNode: ReactiveNode<T>;
    private readonly settings: BehaviorTreeSettings;
    private reactions = 0;

    constructor(ctx: T, rootNode: ReactiveNode<T>, settings: Partial<BehaviorTreeSettings> = {}) {
        this.ctx = ctx;
        this.rootNode = rootNode;
        this.settings = resolveSettings(settings);
    }

    /** Events consumed in the current run */
    get reactionsInRun(): number {
        return this.reactions;
    }

    /** Whether the root would accept `event` right now */
    accepts(event: TreeEvent): boolean {
        return this.rootNode.interestedIn(kindOf(event));
    }

    /** React to a single event, resetting the root when it finishes. */
    dispatch(event: TreeEvent): NodeStatus {
        const status = this.rootNode.react(event, this.ctx);
        this.reactions++;

        if (this.settings.verbose) {
            log.debug(`${event.eventName} #${this.reactions}: ${NodeStatus[status]}`);
        }

        if (isTerminal(status)) {
            this.rootNode.reset(status);
            if (this.settings.verbose) {
                log.debug(`run finished with ${NodeStatus[status]} after ${this.reactions} event(s)`);
            }
            this.reactions = 0;
        }
        return status;
    }

    /**
     * Consume `events` until the root reports a terminal status. Stops early,
     * without a verdict, when the root is not interested in an event.
     */
    run(events: Iterable<TreeEvent>): NodeStatus {
        for (const event of events) {
            if (!this.accepts(event)) {
                if (this.settings.verbose) {
                    log.debug(`root not interested in ${event.eventName}, stopping`);
                }
                return NodeStatus.RUNNING;
            }

            if (this.reactions >= this.settings.maxTicks) {
                const spent = this.reactions;
                this.rootNode.reset(NodeStatus.FAILURE);
                this.reactions = 0;
                const error = new Error(`Behavior tree still RUNNING after ${spent} event(s) (maxTicks)`);
                log.error('event budget exhausted', error);
                throw error;
            }

            const status = this.dispatch(event);
            if (isTerminal(status)) return status;
        }
        return NodeStatus.RUNNING;
    }
}

export function runEvents<T>(
    root: ReactiveNode<T>,
    events: Iterable<TreeEvent>,
    ctx: T,
    settings: Partial<BehaviorTreeSettings> = {},
): NodeStatus {
    return new EventTick(ctx, root, settings).run(events);
}
