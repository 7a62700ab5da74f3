// ── Session states and the transition table ──────────────────────────────────
//
//   (start)  ─init─▶ Welcome            first-run flag unset
//   (start)  ─init─▶ MainMenu           first-run flag set
//   Welcome            ─welcome-complete─────▶ Customization
//   Customization      ─finish-customization─▶ ConnectionConfirm   (writes the flag once)
//   ConnectionConfirm  ─continue─────────────▶ MainMenu            (first-entry | return)
//   MainMenu           ─select-*─────────────▶ activity
//   MainMenu           ─open-settings────────▶ Customization
//   activity           ─finish | back | close▶ MainMenu
//
// Guided healing (start-healing / healing-next) picks its target from the stored
// anxiety level at dispatch time, so it is resolved by the state machine rather
// than listed here.

export const SESSION_STATES = [
    'Welcome',
    'Customization',
    'ConnectionConfirm',
    'MainMenu',
    'Breathing',
    'Altruistic',
    'TreeControl',
    'History',
] as const;

export type SessionState = typeof SESSION_STATES[number];

/** States reachable as steps of a guided healing journey. */
export type HealingStep = Extract<SessionState, 'Breathing' | 'Altruistic' | 'TreeControl'>;

export type SessionTrigger =
    | 'welcome-complete'
    | 'finish-customization'
    | 'continue'
    | 'select-breathing'
    | 'select-altruistic'
    | 'select-tree'
    | 'select-history'
    | 'select-chat'
    | 'open-settings'
    | 'start-healing'
    | 'healing-next'
    | 'finish'
    | 'back'
    | 'close';

/**
 * How the hub was entered from ConnectionConfirm: the first time after the
 * first-run flag was written this session, or any later return.
 */
export type HubEntryKind = 'first-entry' | 'return';

type TransitionRow = Partial<Record<SessionTrigger, SessionState>>;

const RETURN_TO_HUB: TransitionRow = {
    finish: 'MainMenu',
    back: 'MainMenu',
    close: 'MainMenu',
};

export const TRANSITIONS: Readonly<Record<SessionState, TransitionRow>> = {
    Welcome: {
        'welcome-complete': 'Customization',
    },
    Customization: {
        'finish-customization': 'ConnectionConfirm',
    },
    ConnectionConfirm: {
        continue: 'MainMenu',
        ...RETURN_TO_HUB,
    },
    MainMenu: {
        'select-breathing': 'Breathing',
        'select-altruistic': 'Altruistic',
        'select-tree': 'TreeControl',
        'select-history': 'History',
        'select-chat': 'ConnectionConfirm',
        'open-settings': 'Customization',
    },
    Breathing: RETURN_TO_HUB,
    Altruistic: RETURN_TO_HUB,
    TreeControl: RETURN_TO_HUB,
    History: RETURN_TO_HUB,
};

/** Target of a fixed transition, or undefined when the table has no such edge. */
export function lookupTransition(from: SessionState, trigger: SessionTrigger): SessionState | undefined {
    return TRANSITIONS[from][trigger];
}

export function isSessionState(value: string): value is SessionState {
    return SESSION_STATES.some(state => state === value);
}
