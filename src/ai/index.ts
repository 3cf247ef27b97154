/**
 * AI Module
 *
 * Behavior tree primitives: the poll model at the top level, the
 * event-driven model under `reactive`.
 *
 * @module ai
 */

// Behavior tree primitives
export {
    // Core types
    NodeStatus,
    Node,

    // Composite nodes
    ListNode,
    Sequence,
    Selector,

    // Leaf nodes
    Condition,
    Action,
    StatusAction,

    // Decorator nodes
    Decorator,
    Invert,
    ForceSuccess,
    ForceFailure,
    Repeat,
    RepeatUntil,
    RunIf,

    // Builder functions
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
} from './behavior-tree';

export { isTerminal, invertStatus } from './node-status';
export { ChildList, SEQUENCE_POLICY, SELECTOR_POLICY } from './child-list';
export type { ListPolicy, Resettable, ChildVisitor } from './child-list';

// Tick wrapper
export { Tick, run } from './tick';

// Settings
export {
    DEFAULT_SETTINGS,
    resolveSettings,
    parseSettings,
    loadSettingsFile,
    settingsFromEnv,
} from './settings';
export type { BehaviorTreeSettings } from './settings';

// Event-driven model
export * as reactive from './reactive';
