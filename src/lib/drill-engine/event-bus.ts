/**
 * Drill Engine - Event Bus
 *
 * In-process publish/subscribe for engine events (answers, demotions,
 * doom-loop transitions, streak changes). Delivery is synchronous; a handler
 * that throws propagates to the emitter.
 */

import { v4 as uuid } from 'uuid';
import {
    AnswerRecordedEvent,
    DoomLoopEnteredEvent,
    DrillEvent,
    DrillEventSink,
    RecentAnswer,
} from './types';

// =============================================================================
// EVENT BUS
// =============================================================================

export type DrillEventType = DrillEvent['type'];
export type DrillEventOf<K extends DrillEventType> = Extract<DrillEvent, { type: K }>;

type EventHandler<K extends DrillEventType> = (event: DrillEventOf<K>) => void;

interface EventSubscription {
    id: string;
    eventType: DrillEventType;
    deliver: (event: DrillEvent) => void;
}

export function isEventOfType<K extends DrillEventType>(event: DrillEvent, eventType: K): event is DrillEventOf<K> {
    return event.type === eventType;
}

export class DrillEventBus implements DrillEventSink {
    private subscriptions: EventSubscription[] = [];
    private eventHistory: DrillEvent[] = [];

    constructor(private readonly maxHistorySize: number = 100) {}

    /**
     * Subscribe to a specific event type
     */
    subscribe<K extends DrillEventType>(eventType: K, handler: EventHandler<K>): string {
        const id = uuid();
        this.subscriptions.push({
            id,
            eventType,
            deliver: event => {
                if (isEventOfType(event, eventType)) {
                    handler(event);
                }
            },
        });
        return id;
    }

    unsubscribe(subscriptionId: string): void {
        this.subscriptions = this.subscriptions.filter(s => s.id !== subscriptionId);
    }

    emit(event: DrillEvent): void {
        this.eventHistory.push(event);
        if (this.eventHistory.length > this.maxHistorySize) {
            this.eventHistory.shift();
        }

        // Snapshot so handlers may unsubscribe while being notified
        const matching = this.subscriptions.filter(s => s.eventType === event.type);
        for (const subscription of matching) {
            subscription.deliver(event);
        }
    }

    /**
     * Most recent events of one type, oldest first
     */
    getRecentEvents<K extends DrillEventType>(eventType: K, limit: number = 10): DrillEventOf<K>[] {
        const matching: DrillEventOf<K>[] = [];
        for (const event of this.eventHistory) {
            if (isEventOfType(event, eventType)) {
                matching.push(event);
            }
        }
        return matching.slice(-limit);
    }

    subscriptionCount(): number {
        return this.subscriptions.length;
    }

    clearSubscriptions(): void {
        this.subscriptions = [];
    }

    clearHistory(): void {
        this.eventHistory = [];
    }
}

// =============================================================================
// EVENT FACTORY FUNCTIONS
// =============================================================================

export function createAnswerRecordedEvent(
    sessionId: string,
    userId: string,
    factId: string,
    fieldName: string,
    correct: boolean,
    acceptedAlternative: boolean,
    at: Date = new Date()
): AnswerRecordedEvent {
    return {
        type: 'answer_recorded',
        timestampMs: at.getTime(),
        sessionId,
        userId,
        factId,
        fieldName,
        correct,
        acceptedAlternative,
    };
}

export function createDoomLoopEnteredEvent(
    sessionId: string,
    userId: string,
    recentAnswers: readonly RecentAnswer[],
    at: Date = new Date()
): DoomLoopEnteredEvent {
    return {
        type: 'doom_loop_entered',
        timestampMs: at.getTime(),
        sessionId,
        userId,
        recentAnswers: recentAnswers.map(a => ({ ...a })),
    };
}
