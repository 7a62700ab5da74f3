import type { EventBus, SessionEvents } from '../kernel/event_bus';
import type { PanelRegistry } from './panels';
import type { PanelVisibilityController } from './panel_visibility';

/**
 * Full-screen task prompt over whatever primary panel is showing.  Depth 1:
 * a newer prompt replaces the text and stays visible.  Never touches the
 * session's primary state.
 */
export class TaskOverlayController {
    private text = '';
    private readonly disposers: Array<() => void> = [];

    constructor(
        private readonly eventBus: EventBus<SessionEvents>,
        private readonly panels: PanelRegistry,
        private readonly visibility: PanelVisibilityController,
    ) {}

    /** Wire the TASK_PROMPT channel and the overlay's dismiss affordances. */
    public bind(): void {
        if (this.disposers.length > 0) return;
        this.disposers.push(this.eventBus.subscribe('TASK_PROMPT', ({ text }) => this.show(text)));
        const overlay = this.panels.get('TaskOverlay');
        if (overlay) {
            this.disposers.push(overlay.handles.dismiss.onClick.connect(() => this.dismiss()));
            this.disposers.push(overlay.handles.background.onClick.connect(() => this.dismiss()));
        }
    }

    public unbind(): void {
        for (const dispose of this.disposers.splice(0)) dispose();
    }

    public get visible(): boolean {
        return this.visibility.overlayVisible;
    }

    public get currentText(): string {
        return this.text;
    }

    public show(text: string): void {
        if (!this.visibility.showOverlay(text)) return;
        this.text = text;
        this.eventBus.publish('TASK_OVERLAY_STATE', { visible: true, text });
    }

    public dismiss(): void {
        if (!this.visible) return;
        this.visibility.hideOverlay();
        this.eventBus.publish('TASK_OVERLAY_STATE', { visible: false, text: this.text });
    }
}
