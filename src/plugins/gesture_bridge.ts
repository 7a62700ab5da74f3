/**
 * gesture_bridge.ts
 *
 * Entry point for the hand-tracking collaborator.  Raw payloads are validated
 * at this seam and republished on the session bus; anything malformed is
 * logged and dropped so the core only ever sees well-formed events.
 */

import type { ZodType } from 'zod';
import type { Plugin } from '../kernel/plugin_supervisor';
import type { SessionContext } from '../kernel/session_context';
import type { SessionEvents } from '../kernel/event_bus';
import { GestureEventSchema, HandPresenceSchema, OrbActivationSchema } from '../kernel/schemas';

export class GestureBridge implements Plugin {
    public readonly name = 'GestureBridge';
    public readonly version = '1.0.0';

    private context: SessionContext | null = null;
    private running = false;

    public init(context: SessionContext): void {
        this.context = context;
    }

    public start(): void {
        this.running = true;
    }

    public stop(): void {
        this.running = false;
    }

    public destroy(): void {
        this.stop();
        this.context = null;
    }

    /** `{ gestureType, confidence }` from the tracker. */
    public ingestGesture(raw: unknown): boolean {
        return this.forward('GESTURE', GestureEventSchema, raw);
    }

    /** `{ detected }`: palm detected / hand lost. */
    public ingestHandPresence(raw: unknown): boolean {
        return this.forward('HAND_PRESENCE', HandPresenceSchema, raw);
    }

    /** `{ orbIndex }`: the user touched a floating orb. */
    public ingestOrbActivation(raw: unknown): boolean {
        return this.forward('ORB_ACTIVATED', OrbActivationSchema, raw);
    }

    private forward<K extends 'GESTURE' | 'HAND_PRESENCE' | 'ORB_ACTIVATED'>(
        channel: K,
        schema: ZodType<SessionEvents[K]>,
        raw: unknown,
    ): boolean {
        if (!this.running || !this.context) {
            console.warn(`[GestureBridge] Not running; dropped ${channel}`);
            return false;
        }
        const parsed = schema.safeParse(raw);
        if (!parsed.success) {
            console.warn(`[GestureBridge] Invalid ${channel} payload dropped`, parsed.error.issues);
            return false;
        }
        this.context.eventBus.publish(channel, parsed.data);
        return true;
    }
}
