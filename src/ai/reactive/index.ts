/**
 * Event-driven behavior trees. Nodes consume one event per call and can
 * declare which event kinds they accept.
 *
 * @module ai/reactive
 */

export {
    EventKind,
    MarkerEvent,
    TickEvent,
    fingerprintOf,
    kindOf,
    tickEvents,
} from './event-kind';
export type { TreeEvent, EventType } from './event-kind';

export {
    ReactiveNode,
    ReactiveListNode,
    ReactiveSequence,
    ReactiveSelector,
    ReactiveCondition,
    ReactiveAction,
    ReactiveStatusAction,
    ReactiveDecorator,
    ReactiveInvert,
    ReactiveForceSuccess,
    ReactiveForceFailure,
    ReactiveRepeat,
    ReactiveRepeatUntil,
    ReactiveRunIf,
    RepeatUntilSuccess,
    RepeatUntilFailure,
    EventGate,
    sequence,
    selector,
    condition,
    action,
    statusAction,
    invert,
    forceSuccess,
    forceFailure,
    repeat,
    repeatUntil,
    runIf,
    repeatUntilSuccess,
    repeatUntilFailure,
    eventGate,
    waitFor,
} from './reactive-tree';

export { EventTick, runEvents } from './event-tick';
