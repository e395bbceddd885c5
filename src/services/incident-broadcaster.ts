import type { WsEventTopic } from '../types/websocket.js';
import type { Incident, IncidentEventType } from '../types/incident.js';
import { getErrorMessage } from '../utils/errors.js';
import { logThought } from '../utils/logger.js';

/** The slice of the hub the broadcaster needs. */
export interface EventPublisher {
    publish<T>(topic: WsEventTopic, payload: T): void;
}

export interface IncidentEventPayload<T = Incident> {
    event: IncidentEventType;
    data: T;
}

/**
 * At-most-once fan-out of incident lifecycle events on the `incidents` topic.
 * A failed publish is logged and never reaches the caller.
 */
export class IncidentBroadcaster {
    readonly #publisher: EventPublisher | null;

    constructor(publisher: EventPublisher | null) {
        this.#publisher = publisher;
    }

    publish<T = Incident>(event: IncidentEventType, data: T): void {
        if (!this.#publisher) {
            return;
        }
        const payload: IncidentEventPayload<T> = { event, data };
        try {
            this.#publisher.publish('incidents', payload);
        } catch (error) {
            void logThought(`[IncidentBroadcaster] Failed to publish '${event}': ${getErrorMessage(error)}`);
        }
    }
}
