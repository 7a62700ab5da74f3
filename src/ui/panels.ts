import type { SessionState } from '../session/session_state';
import type { UiNode } from './surface';
import type { DropdownWidget } from './dropdown';
import type {
    ButtonWidget,
    ColorButtonWidget,
    ScrollListWidget,
    SliderWidget,
    TextInputWidget,
    TextWidget,
} from './widgets';

export type PrimaryPanelName = SessionState;
export type PanelName = PrimaryPanelName | 'TaskOverlay';

export const PRIMARY_PANELS: readonly PrimaryPanelName[] = [
    'Welcome',
    'Customization',
    'ConnectionConfirm',
    'MainMenu',
    'Breathing',
    'Altruistic',
    'TreeControl',
    'History',
];

/** Named widget handles each panel exposes for outer logic to bind to. */
export interface PanelHandles {
    Welcome: {
        title: TextWidget;
        subtitle: TextWidget;
        begin: ButtonWidget;
    };
    Customization: {
        title: TextWidget;
        brightness: SliderWidget;
        volume: SliderWidget;
        scale: SliderWidget;
        themeColors: ColorButtonWidget[];
        companionColors: ColorButtonWidget[];
        accessories: ButtonWidget[];
        accessoryStatus: TextWidget;
        finish: ButtonWidget;
    };
    ConnectionConfirm: {
        title: TextWidget;
        transcript: ScrollListWidget;
        input: TextInputWidget;
        send: ButtonWidget;
        thinking: TextWidget;
        continueButton: ButtonWidget;
    };
    MainMenu: {
        title: TextWidget;
        nutrients: TextWidget;
        hint: TextWidget;
        startHealing: ButtonWidget;
        settings: ButtonWidget;
        sidebar: UiNode;
        breathing: ButtonWidget;
        altruistic: ButtonWidget;
        tree: ButtonWidget;
        history: ButtonWidget;
        chat: ButtonWidget;
    };
    Breathing: {
        title: TextWidget;
        phase: TextWidget;
        remaining: TextWidget;
        finish: ButtonWidget;
    };
    Altruistic: {
        title: TextWidget;
        instructions: TextWidget;
        touches: TextWidget;
        cameraPreview: UiNode;
        comfort: ButtonWidget;
        finish: ButtonWidget;
    };
    TreeControl: {
        title: TextWidget;
        seasonLabel: TextWidget;
        season: DropdownWidget;
        resetOrbs: ButtonWidget;
        close: ButtonWidget;
    };
    History: {
        title: TextWidget;
        status: TextWidget;
        list: ScrollListWidget;
        back: ButtonWidget;
    };
    TaskOverlay: {
        background: ButtonWidget;
        title: TextWidget;
        message: TextWidget;
        dismiss: ButtonWidget;
    };
}

export interface Panel<K extends PanelName> {
    readonly name: K;
    readonly root: UiNode;
    readonly handles: PanelHandles[K];
}

export type PanelTable = { [K in PanelName]?: Panel<K> };

/** Built panels by name.  A panel whose builder failed is simply absent. */
export class PanelRegistry {
    constructor(private readonly panels: Readonly<PanelTable> = {}) {}

    public get<K extends PanelName>(name: K): Panel<K> | undefined {
        return this.panels[name];
    }

    public has(name: PanelName): boolean {
        return this.panels[name] !== undefined;
    }

    public root(name: PanelName): UiNode | undefined {
        return this.panels[name]?.root;
    }

    public names(): PanelName[] {
        const all: PanelName[] = [...PRIMARY_PANELS, 'TaskOverlay'];
        return all.filter(name => this.has(name));
    }
}
