import type { StateEntry } from '../session/session_state_machine';
import { StatePlugin } from './state_plugin';

export const COMFORT_GESTURE = 'comfort';
export const COMFORTED_PROMPT = '💛 Your companion feels comforted!\n\nThank you for your kindness.';

/**
 * Comfort the companion: each accepted touch (a confident `comfort` gesture
 * or the Comfort button) counts once per cooldown, up to the required count.
 * Hand presence shows or hides the camera preview.
 */
export class AltruisticPlugin extends StatePlugin<'Altruistic'> {
    public readonly name = 'AltruisticPlugin';
    public readonly state = 'Altruistic';

    private touches = 0;
    private lastTouchAt: number | null = null;

    public get touchCount(): number {
        return this.touches;
    }

    /** Count one comfort touch; false when capped, cooling down or inactive. */
    public registerTouch(): boolean {
        if (!this.isActive) return false;
        const required = this.config.altruistic_required_touches;
        if (this.touches >= required) return false;

        const now = this.now().getTime();
        if (this.lastTouchAt !== null && now - this.lastTouchAt < this.config.comfort_cooldown_ms) {
            return false;
        }
        this.lastTouchAt = now;
        this.touches++;
        this.render();
        this.context.eventBus.publish('COMFORT_PROGRESS', { touches: this.touches, required });

        if (this.touches === required) {
            this.panel?.handles.finish.setLabel(this.finishLabel('Finish'));
            this.context.eventBus.publish('TASK_PROMPT', { text: COMFORTED_PROMPT, source: 'altruistic' });
        }
        return true;
    }

    protected bind(): Array<() => void> {
        const panel = this.panel;
        if (!panel) return [];
        const h = panel.handles;
        const bus = this.context.eventBus;
        return [
            h.comfort.onClick.connect(() => {
                this.registerTouch();
            }),
            h.finish.onClick.connect(() => this.leave('finish')),
            bus.subscribe('GESTURE', ({ gestureType, confidence }) => {
                if (gestureType !== COMFORT_GESTURE) return;
                if (confidence < this.config.gesture_confidence_threshold) return;
                this.registerTouch();
            }),
            bus.subscribe('HAND_PRESENCE', ({ detected }) => {
                if (!this.isActive) return;
                this.panel?.handles.cameraPreview.setVisible(detected);
            }),
        ];
    }

    protected onEnter(_transition: StateEntry): void {
        this.touches = 0;
        this.lastTouchAt = null;
        this.panel?.handles.cameraPreview.setVisible(false);
        this.panel?.handles.finish.setLabel(this.finishLabel('Finish'));
        this.render();
    }

    protected onExit(): void {
        this.panel?.handles.cameraPreview.setVisible(false);
    }

    private render(): void {
        this.panel?.handles.touches.setText(`Touches: ${this.touches}/${this.config.altruistic_required_touches}`);
    }
}
