/**
 * @file breathing_plugin.ts
 * @description Guided 4-7-8 breathing: a prepare phase, then cycles of
 * Inhale / Hold / Exhale driven by a tick interval owned by this state.
 *
 *   Scenario: Leave mid-exercise
 *     Given the exercise is running
 *     When finish is triggered
 *     Then the interval is cleared before MainMenu is shown and nothing ticks afterwards
 */

import type { SessionConfig } from '../kernel/config';
import type { StateEntry } from '../session/session_state_machine';
import { FLAG_KEYS, readNumber } from '../session/flag_store';
import { StatePlugin } from './state_plugin';

export type BreathingPhase = 'Prepare' | 'Inhale' | 'Hold' | 'Exhale' | 'Complete';

export type BreathingTimings = Pick<SessionConfig,
    'breathing_prepare_s' | 'breathing_inhale_s' | 'breathing_hold_s' | 'breathing_exhale_s' | 'breathing_cycles'>;

export interface BreathingFrame {
    phase: BreathingPhase;
    /** Whole seconds left in the current phase, rounded up. */
    phaseSecondsLeft: number;
    /** 1-based cycle; the prepare phase reports the first cycle. */
    cycle: number;
    cycles: number;
    /** Whole seconds left in the exercise, rounded up. */
    totalSecondsLeft: number;
}

export function totalBreathingSeconds(t: BreathingTimings): number {
    return t.breathing_prepare_s + t.breathing_cycles * (t.breathing_inhale_s + t.breathing_hold_s + t.breathing_exhale_s);
}

/** Where the exercise stands `elapsedMs` after it started. */
export function breathingFrame(elapsedMs: number, t: BreathingTimings): BreathingFrame {
    const elapsed = Math.max(0, elapsedMs) / 1000;
    const total = totalBreathingSeconds(t);
    const cycles = t.breathing_cycles;
    const totalSecondsLeft = Math.max(0, Math.ceil(total - elapsed - 1e-9));

    if (elapsed >= total) {
        return { phase: 'Complete', phaseSecondsLeft: 0, cycle: cycles, cycles, totalSecondsLeft: 0 };
    }
    if (elapsed < t.breathing_prepare_s) {
        return { phase: 'Prepare', phaseSecondsLeft: Math.ceil(t.breathing_prepare_s - elapsed), cycle: 1, cycles, totalSecondsLeft };
    }

    const cycleLength = t.breathing_inhale_s + t.breathing_hold_s + t.breathing_exhale_s;
    const intoCycles = elapsed - t.breathing_prepare_s;
    const cycleIndex = Math.min(cycles - 1, Math.floor(intoCycles / cycleLength));
    const intoCycle = intoCycles - cycleIndex * cycleLength;

    const phases: Array<[BreathingPhase, number]> = [
        ['Inhale', t.breathing_inhale_s],
        ['Hold', t.breathing_hold_s],
        ['Exhale', t.breathing_exhale_s],
    ];
    let offset = 0;
    for (const [phase, length] of phases) {
        if (intoCycle < offset + length) {
            return {
                phase,
                phaseSecondsLeft: Math.ceil(offset + length - intoCycle),
                cycle: cycleIndex + 1,
                cycles,
                totalSecondsLeft,
            };
        }
        offset += length;
    }
    return { phase: 'Exhale', phaseSecondsLeft: 0, cycle: cycleIndex + 1, cycles, totalSecondsLeft };
}

export function formatRemaining(seconds: number): string {
    const m = Math.floor(seconds / 60);
    const s = seconds % 60;
    return `Remaining: ${String(m).padStart(2, '0')}:${String(s).padStart(2, '0')}`;
}

export function phaseText(frame: BreathingFrame): string {
    if (frame.phase === 'Complete') return 'Well done!';
    return `${frame.phase}\n${frame.phaseSecondsLeft}s\nCycle ${frame.cycle}/${frame.cycles}`;
}

export class BreathingPlugin extends StatePlugin<'Breathing'> {
    public readonly name = 'BreathingPlugin';
    public readonly state = 'Breathing';

    private elapsedMs = 0;
    private completed = false;

    public get isCompleted(): boolean {
        return this.completed;
    }

    protected bind(): Array<() => void> {
        const panel = this.panel;
        if (!panel) return [];
        return [panel.handles.finish.onClick.connect(() => this.leave('finish'))];
    }

    protected onEnter(_transition: StateEntry): void {
        this.elapsedMs = 0;
        this.completed = false;
        this.panel?.handles.finish.setLabel('Skip');
        this.render(breathingFrame(0, this.config));

        const timer = this.every(this.config.tick_ms, () => {
            this.elapsedMs += this.config.tick_ms;
            const frame = breathingFrame(this.elapsedMs, this.config);
            this.render(frame);
            if (frame.phase === 'Complete') {
                this.cancel(timer);
                this.complete();
            }
        });
    }

    private complete(): void {
        this.completed = true;
        const nutrients = this.config.breathing_nutrients;
        this.withStore('adding nutrients', store =>
            store.set(FLAG_KEYS.totalNutrients, readNumber(store, FLAG_KEYS.totalNutrients, 0) + nutrients));
        this.panel?.handles.finish.setLabel(this.finishLabel('Finish'));
        this.context.eventBus.publish('BREATHING_COMPLETED', { nutrients });
        this.log(`Completed; +${nutrients} nutrients`);
    }

    private render(frame: BreathingFrame): void {
        const panel = this.panel;
        if (!panel) return;
        panel.handles.phase.setText(phaseText(frame));
        panel.handles.remaining.setText(formatRemaining(frame.totalSecondsLeft));
    }
}
