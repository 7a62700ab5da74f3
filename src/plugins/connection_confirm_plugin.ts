/**
 * @file connection_confirm_plugin.ts
 * @description Chat check-in with the companion.
 *
 *   Scenario: Send a message
 *     Given the chat panel is active and no request is pending
 *     When the user sends a non-empty message
 *     Then it is appended to the transcript, the thinking indicator shows and
 *          the backend receives the message with the recent transcript as context
 *
 *   Scenario: No reply in time
 *     Given a pending request
 *     When chat_timeout_ms passes first
 *     Then the indicator hides, a fallback line is appended and the late reply
 *          (if it ever comes) is dropped
 */

import { ChatReplySchema } from '../kernel/schemas';
import type { ChatTurn } from '../kernel/session_context';
import type { StateEntry } from '../session/session_state_machine';
import { classifyAnxiety, storeAnxietyLevel } from '../session/guided_healing';
import { StatePlugin } from './state_plugin';

export const COMPANION_NAME = 'Nomi';

export const CHAT_LINES = {
    greeting: 'Hi! How are you feeling today?',
    emptyReply: "I'm here to listen. Tell me more about how you're feeling.",
    malformedReply: 'I understand. Could you tell me more about that?',
    unavailable: "I'm having trouble connecting right now, but I'm here for you. Please continue.",
    severePrompt: "You're not alone right now.\n\nWhen you're ready, try Start Healing from the hub.",
} as const;

export interface TranscriptEntry extends ChatTurn {
    timestamp: string;
}

const LINE_HEIGHT = 30;
const CHARS_PER_LINE = 48;

export function formatClock(date: Date): string {
    const pad = (n: number) => String(n).padStart(2, '0');
    return `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

export class ConnectionConfirmPlugin extends StatePlugin<'ConnectionConfirm'> {
    public readonly name = 'ConnectionConfirmPlugin';
    public readonly state = 'ConnectionConfirm';

    private readonly entries: TranscriptEntry[] = [];
    private requestSeq = 0;
    private pendingRequest: number | null = null;

    public get transcript(): readonly TranscriptEntry[] {
        return this.entries;
    }

    public get isAwaitingReply(): boolean {
        return this.pendingRequest !== null;
    }

    /**
     * Send a check-in message.  Returns false when it was ignored: blank text,
     * a request already in flight, or the chat state not active.
     */
    public sendMessage(raw: string): boolean {
        const message = raw.trim();
        if (!this.isActive || message.length === 0) return false;
        if (this.pendingRequest !== null) {
            console.warn(`[${this.name}] A reply is still pending; message ignored`);
            return false;
        }

        const contextWindow = this.config.chat_context_window;
        const context: ChatTurn[] = (contextWindow > 0 ? this.entries.slice(-contextWindow) : [])
            .map(({ role, content }) => ({ role, content }));
        this.append('user', message);
        this.recordAnxiety(message);
        this.panel?.handles.input.setText('');

        const client = this.context.pal.resolve('chatClient');
        if (!client) {
            console.error(`[${this.name}] No chat client registered`);
            this.append('assistant', CHAT_LINES.unavailable);
            return true;
        }

        const id = ++this.requestSeq;
        this.pendingRequest = id;
        this.setThinking(true);
        this.after(this.config.chat_timeout_ms, () => this.onTimeout(id));

        let request: Promise<unknown>;
        try {
            request = client.send({ message, context });
        } catch (error) {
            request = Promise.reject(error);
        }
        void request.then(
            reply => this.onReply(id, reply),
            (error: unknown) => this.onFailure(id, error),
        );
        return true;
    }

    protected bind(): Array<() => void> {
        const panel = this.panel;
        if (!panel) return [];
        const h = panel.handles;
        return [
            h.send.onClick.connect(() => {
                this.sendMessage(h.input.text);
            }),
            h.input.onSubmit.connect(text => {
                this.sendMessage(text);
            }),
            h.continueButton.onClick.connect(() => this.context.session.dispatch('continue')),
        ];
    }

    protected onEnter(_transition: StateEntry): void {
        if (this.entries.length === 0) {
            this.append('assistant', CHAT_LINES.greeting);
        }
        this.setThinking(false);
    }

    protected onExit(): void {
        if (this.pendingRequest !== null) {
            this.log('Left chat with a reply pending; it will be dropped');
        }
        this.pendingRequest = null;
        this.setThinking(false);
    }

    private onReply(id: number, raw: unknown): void {
        if (!this.claim(id, 'reply')) return;
        const parsed = ChatReplySchema.safeParse(raw);
        if (!parsed.success) {
            console.warn(`[${this.name}] Malformed chat reply`, parsed.error.issues);
            this.append('assistant', CHAT_LINES.malformedReply);
            return;
        }
        const reply = parsed.data.reply.trim();
        this.append('assistant', reply.length > 0 ? reply : CHAT_LINES.emptyReply);
    }

    private onFailure(id: number, error: unknown): void {
        if (!this.claim(id, 'failure')) return;
        console.error(`[${this.name}] Chat request failed`, error);
        this.append('assistant', CHAT_LINES.unavailable);
    }

    private onTimeout(id: number): void {
        if (!this.claim(id, 'timeout')) return;
        console.error(`[${this.name}] Chat reply timed out after ${this.config.chat_timeout_ms} ms`);
        this.append('assistant', CHAT_LINES.unavailable);
    }

    /** The first outcome for the pending request wins; later ones are dropped. */
    private claim(id: number, outcome: string): boolean {
        if (this.pendingRequest !== id) {
            this.log(`Dropped late ${outcome} for request ${id}`);
            return false;
        }
        this.pendingRequest = null;
        this.clearTimers();
        this.setThinking(false);
        return true;
    }

    private recordAnxiety(message: string): void {
        const level = classifyAnxiety(message);
        storeAnxietyLevel(this.context.pal.require('flagStore'), level);
        if (level === 'severe') {
            this.context.eventBus.publish('TASK_PROMPT', { text: CHAT_LINES.severePrompt, source: 'chat' });
        }
    }

    private append(role: ChatTurn['role'], content: string): void {
        const entry: TranscriptEntry = { role, content, timestamp: formatClock(this.now()) };
        this.entries.push(entry);
        this.render(entry, this.entries.length - 1);
        this.context.eventBus.publish('CHAT_TRANSCRIPT', { role, content });
    }

    private render(entry: TranscriptEntry, index: number): void {
        const panel = this.panel;
        if (!panel) return;
        const list = panel.handles.transcript;
        const speaker = entry.role === 'user' ? 'You' : COMPANION_NAME;
        const text = `[${entry.timestamp}] ${speaker}: ${entry.content}`;
        const lines = Math.max(1, Math.ceil(text.length / CHARS_PER_LINE));
        const height = lines * LINE_HEIGHT + 10;

        const slot = list.addItem(`Entry ${index}`, height);
        this.context.widgets.text(slot, 'Text', { x: 0, y: 0 }, { x: slot.size.x - 20, y: height }, { text, fontSize: 22 });
        list.scrollToBottom();
    }

    private setThinking(visible: boolean): void {
        this.panel?.handles.thinking.node.setVisible(visible);
    }
}
