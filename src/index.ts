export { createHealingSession } from './app';
export type { HealingSession, HealingSessionOptions, SessionPlugins } from './app';

export { EventBus } from './kernel/event_bus';
export type { SessionEvents, EventCallback } from './kernel/event_bus';
export { PathAbstractionLayer, MissingCollaboratorError } from './kernel/pal';
export { ConfigManager, ConfigValidationError, DEFAULT_CONFIG, SessionConfigSchema } from './kernel/config';
export type { SessionConfig } from './kernel/config';
export { PluginSupervisor, LifecycleGateError } from './kernel/plugin_supervisor';
export type { Plugin, SupervisorState } from './kernel/plugin_supervisor';
export type {
    SessionContext,
    SessionCollaborators,
    ChatClient,
    ChatRequest,
    ChatTurn,
    HistorySource,
} from './kernel/session_context';
export * from './kernel/schemas';

export { SessionStateMachine } from './session/session_state_machine';
export type { StateController, StateEntry } from './session/session_state_machine';
export { SESSION_STATES, TRANSITIONS, lookupTransition } from './session/session_state';
export type { SessionState, SessionTrigger, HubEntryKind, HealingStep } from './session/session_state';
export { MemoryFlagStore, FLAG_KEYS } from './session/flag_store';
export type { FlagStore, FlagValue } from './session/flag_store';
export { HEALING_PATHS, classifyAnxiety, nextHealingStep } from './session/guided_healing';
export type { AnxietyLevel } from './session/guided_healing';

export { UiNode, HeadlessSurface, describeTree } from './ui/surface';
export type { UiSurface, NodeChange, Vec2, Rgba, FrameSnapshot } from './ui/surface';
export { WidgetFactory } from './ui/widget_factory';
export * from './ui/widgets';
export { DropdownWidget } from './ui/dropdown';
export { PanelBuilder, SEASONS } from './ui/panel_builder';
export { PanelRegistry, PRIMARY_PANELS } from './ui/panels';
export type { Panel, PanelName, PanelHandles, PrimaryPanelName } from './ui/panels';
export { PanelVisibilityController } from './ui/panel_visibility';
export { TaskOverlayController } from './ui/task_overlay';

export { GestureBridge } from './plugins/gesture_bridge';
