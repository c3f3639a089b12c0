import { RunRequest } from '../supervisor/types';
import { isOrderLookup, isOrderPrompt, parseOrderId, parseOrderTerms } from './order';
import { InvalidRequestError } from '../errors/run.errors';
import { broadcast, Decomposer, DispatchPlan, unicast } from './types';

export const DEFAULT_FARMS = ['brazil', 'colombia', 'vietnam'];

function escapeRegExp(text: string): string {
    return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

const ALL_WORDS = /\b(all|every|each|total|farms)\b/i;

export interface FarmDecomposerOptions {
    farms?: string[];
    broadcastTopic?: string;
    /** Agent that answers order status lookups. */
    ordersAgent?: string;
}

/**
 * Exchange profile: inventory questions go to one farm or to every farm
 * named (or all of them); orders go to exactly one farm and order
 * lookups go to the orders agent.
 */
export class FarmDecomposer implements Decomposer {
    readonly farms: string[];
    private readonly broadcastTopic: string;
    private readonly ordersAgent: string;

    constructor(options: FarmDecomposerOptions = {}) {
        this.farms = (options.farms ?? DEFAULT_FARMS).map(f => f.toLowerCase());
        this.broadcastTopic = options.broadcastTopic ?? 'farm_broadcast';
        this.ordersAgent = options.ordersAgent ?? 'orders';
    }

    decompose(request: RunRequest): DispatchPlan {
        const prompt = request.prompt;
        if (isOrderLookup(prompt)) {
            const orderId = parseOrderId(prompt);
            return {
                tasks: [unicast(this.ordersAgent, `Get details for order ID ${orderId}`)],
                tolerance: 'strict',
            };
        }

        const named = this.namedFarms(prompt);
        if (isOrderPrompt(prompt)) {
            const { price, quantity } = parseOrderTerms(prompt);
            if (named.length !== 1) {
                throw new InvalidRequestError('No farm provided. Please specify a farm.');
            }
            const farm = named[0];
            return {
                tasks: [unicast(farm, `create order with price ${price} and quantity ${quantity}`)],
                tolerance: 'strict',
            };
        }

        if (named.length === 1 && !ALL_WORDS.test(prompt)) {
            return { tasks: [unicast(named[0], prompt)], tolerance: 'partial' };
        }

        const recipients = named.length > 1 ? named : this.farms;
        return { tasks: broadcast(this.broadcastTopic, recipients, prompt), tolerance: 'partial' };
    }

    // Known farms mentioned in the prompt, in configured order.
    namedFarms(prompt: string): string[] {
        const lower = prompt.toLowerCase();
        return this.farms.filter(farm => new RegExp(`\\b${escapeRegExp(farm)}\\b`).test(lower));
    }
}
