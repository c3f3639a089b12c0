import { MessageHandler, Subscription, Transport, TransportDeliveryError } from './transport';

const TAG = '[transport:memory]';

// In-process pub/sub. Handlers run on a later macrotask so a publisher
// never observes its own message being handled inside publish().
export class InMemoryTransport implements Transport {
    readonly name = 'MEMORY';
    private topics = new Map<string, Set<MessageHandler>>();
    private closed = false;
    private published = 0;

    async publish(topic: string, message: string): Promise<void> {
        if (this.closed) {
            throw new TransportDeliveryError(topic, 'transport is closed');
        }

        const handlers = this.topics.get(topic);
        if (!handlers || handlers.size === 0) {
            throw new TransportDeliveryError(topic, `no subscribers on ${topic}`);
        }

        this.published++;
        for (const handler of Array.from(handlers)) {
            setImmediate(() => {
                try {
                    handler(message, topic);
                } catch (err) {
                    console.error(`${TAG} handler error on ${topic}:`, err);
                }
            });
        }
    }

    async subscribe(topic: string, handler: MessageHandler): Promise<Subscription> {
        if (this.closed) {
            throw new Error(`${TAG} cannot subscribe to ${topic}: transport is closed`);
        }

        const handlers = this.topics.get(topic) ?? new Set<MessageHandler>();
        handlers.add(handler);
        this.topics.set(topic, handlers);

        return {
            topic,
            unsubscribe: async () => {
                handlers.delete(handler);
                if (handlers.size === 0) this.topics.delete(topic);
            },
        };
    }

    subscriberCount(topic: string): number {
        return this.topics.get(topic)?.size ?? 0;
    }

    get publishedCount(): number {
        return this.published;
    }

    async close(): Promise<void> {
        this.closed = true;
        this.topics.clear();
    }
}
