import { Transport, WorkerAgent, WorkerCapability } from '@switchyard/sdk';
import { v7 as uuidv7 } from 'uuid';
import { extractStatus, LogisticsStatus } from '../decomposition/logistics-status';
import { LOGISTICS_AGENTS } from '../decomposition/logistics.decomposer';

// Development stand-ins for real agents. Deterministic so local runs and
// tests see stable answers.

export const FARM_YIELDS: Record<string, number> = {
    brazil: 8500,
    colombia: 5000,
    vietnam: 6200,
};

const ORDER_REQUEST = /create order with price (\d+(?:\.\d+)?) and quantity (\d+(?:\.\d+)?)/i;
const ORDER_LOOKUP = /get details for order id\s+(\S+)/i;

export interface OrderRecord {
    farm: string;
    price: number;
    quantity: number;
}

/** Orders placed with the mock farms, shared with the orders agent. */
export type OrderBook = Map<string, OrderRecord>;

export function farmCapability(farm: string, idGenerator: () => string = uuidv7, orders?: OrderBook): WorkerCapability {
    return async (payload) => {
        const order = ORDER_REQUEST.exec(payload);
        if (order) {
            const orderId = idGenerator();
            orders?.set(orderId, { farm, price: Number(order[1]), quantity: Number(order[2]) });
            return `order_id: ${orderId}`;
        }
        const amount = FARM_YIELDS[farm];
        if (amount === undefined) {
            throw new Error(`Farm '${farm}' has no yield data`);
        }
        return `${amount} lbs`;
    };
}

export function ordersCapability(orders: OrderBook): WorkerCapability {
    return async (payload) => {
        const lookup = ORDER_LOOKUP.exec(payload);
        if (!lookup) throw new Error('No order ID in request');
        const orderId = lookup[1];
        const record = orders.get(orderId);
        if (!record) throw new Error(`Order ${orderId} not found`);
        return `Order ${orderId}: ${record.quantity} lbs from ${record.farm} at $${record.price}, status CONFIRMED`;
    };
}

export const scraperCapability: WorkerCapability = async (payload) => {
    const url = payload.replace(/^scrape\s+/i, '').trim();
    if (!url) throw new Error('No URL to scrape');
    return `Summary of ${url}`;
};

const STEP_DETAILS: Partial<Record<LogisticsStatus, string>> = {
    [LogisticsStatus.RECEIVED_ORDER]: 'Prepared shipment and documentation',
    [LogisticsStatus.HANDOVER_TO_SHIPPER]: 'Picked up from farm',
    [LogisticsStatus.CUSTOMS_CLEARANCE]: 'Cleared customs at destination port',
    [LogisticsStatus.PAYMENT_COMPLETE]: 'Payment settled',
    [LogisticsStatus.DELIVERED]: 'Delivered to customer',
};

export function logisticsCapability(agent: string): WorkerCapability {
    return async (payload) => {
        const status = extractStatus(payload);
        if (status === LogisticsStatus.STATUS_UNKNOWN) {
            return `${agent} remains IDLE. No further action required.`;
        }
        const order = /Order\s+([A-Za-z0-9-]+)/.exec(payload);
        const orderRef = order ? `Order ${order[1]}` : 'Order';
        return `${status} | ${agent} -> Supervisor: ${orderRef} ${STEP_DETAILS[status] ?? ''}`.trim();
    };
}

export interface MockWorkerOptions {
    profile: 'exchange' | 'news' | 'logistics';
    farms?: string[];
    farmBroadcastTopic: string;
    ordersAgent?: string;
    logisticsGroupTopic: string;
}

/** Starts in-process workers for the given profile on the shared transport. */
export async function startMockWorkers(transport: Transport, options: MockWorkerOptions): Promise<WorkerAgent[]> {
    let agents: WorkerAgent[];
    switch (options.profile) {
        case 'exchange': {
            const orders: OrderBook = new Map();
            agents = (options.farms ?? Object.keys(FARM_YIELDS)).map(farm => new WorkerAgent({
                name: farm,
                transport,
                capability: farmCapability(farm, uuidv7, orders),
                groups: [options.farmBroadcastTopic],
            }));
            agents.push(new WorkerAgent({
                name: options.ordersAgent ?? 'orders',
                transport,
                capability: ordersCapability(orders),
            }));
            break;
        }
        case 'news':
            agents = [new WorkerAgent({ name: 'scraper', transport, capability: scraperCapability })];
            break;
        case 'logistics':
            agents = LOGISTICS_AGENTS.map(name => new WorkerAgent({
                name,
                transport,
                capability: logisticsCapability(name),
                groups: [options.logisticsGroupTopic],
            }));
            break;
    }

    for (const agent of agents) {
        await agent.start();
    }
    return agents;
}
