import Redis from 'ioredis';
import { MessageHandler, Subscription, Transport, TransportDeliveryError } from '@switchyard/sdk';

const TAG = '[transport:redis]';

/**
 * Redis pub/sub binding. A connection in subscriber mode cannot publish,
 * so publishing and subscribing use separate clients.
 */
export class RedisTransport implements Transport {
    readonly name = 'REDIS';
    private readonly handlers = new Map<string, Set<MessageHandler>>();

    constructor(private readonly publisher: Redis, private readonly subscriber: Redis) {
        this.subscriber.on('message', (channel: string, message: string) => this.dispatch(channel, message));
    }

    async publish(topic: string, message: string): Promise<void> {
        const receivers = await this.publisher.publish(topic, message);
        if (receivers === 0) {
            throw new TransportDeliveryError(topic, `no subscribers on ${topic}`);
        }
    }

    async subscribe(topic: string, handler: MessageHandler): Promise<Subscription> {
        const existing = this.handlers.get(topic);
        const set = existing ?? new Set<MessageHandler>();
        set.add(handler);
        if (!existing) {
            this.handlers.set(topic, set);
            try {
                await this.subscriber.subscribe(topic);
            } catch (err) {
                // Forget the channel so the next subscribe issues SUBSCRIBE again.
                if (this.handlers.get(topic) === set) this.handlers.delete(topic);
                throw err;
            }
        }

        return {
            topic,
            unsubscribe: async () => {
                set.delete(handler);
                if (set.size === 0 && this.handlers.get(topic) === set) {
                    this.handlers.delete(topic);
                    await this.subscriber.unsubscribe(topic);
                }
            },
        };
    }

    async close(): Promise<void> {
        this.handlers.clear();
        await Promise.all([this.publisher.quit(), this.subscriber.quit()]);
    }

    private dispatch(channel: string, message: string): void {
        const set = this.handlers.get(channel);
        if (!set) return;
        for (const handler of Array.from(set)) {
            try {
                handler(message, channel);
            } catch (err) {
                console.error(`${TAG} handler error on ${channel}:`, err);
            }
        }
    }
}
