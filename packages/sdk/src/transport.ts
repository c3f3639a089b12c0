export type MessageHandler = (message: string, topic: string) => void;

export interface Subscription {
    readonly topic: string;
    unsubscribe(): Promise<void>;
}

/**
 * Publish/subscribe channel shared by supervisors and workers.
 * Implementations must reject `publish` with a TransportDeliveryError when
 * the message cannot reach any subscriber.
 */
export interface Transport {
    readonly name: string;
    publish(topic: string, message: string): Promise<void>;
    subscribe(topic: string, handler: MessageHandler): Promise<Subscription>;
    close(): Promise<void>;
}

export class TransportDeliveryError extends Error {
    readonly code = 'TRANSPORT_DELIVERY_FAILED';

    constructor(public readonly topic: string, message: string) {
        super(message);
        this.name = 'TransportDeliveryError';
    }
}

export function agentTopic(name: string): string {
    return `agents.${name}`;
}

export function replyTopic(instanceId: string): string {
    return `supervisor.${instanceId}.replies`;
}
