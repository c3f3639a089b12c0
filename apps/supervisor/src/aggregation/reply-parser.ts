import { LogisticsStatus, extractStatus } from '../decomposition/logistics-status';

export type ParsedReply =
    | { kind: 'inventory'; quantity: number; unit: string }
    | { kind: 'order'; orderId: string }
    | { kind: 'logistics'; status: LogisticsStatus; orderId?: string }
    | { kind: 'text'; text: string };

const ORDER_ID = /order[_ ]id\s*[:=]\s*([A-Za-z0-9-]+)/i;
const ORDER_REF = /Order\s+([A-Za-z0-9-]+)/;
const INVENTORY = /^\s*(\d[\d,]*(?:\.\d+)?)\s+([A-Za-z][A-Za-z ]*?)\s*\.?\s*$/;

/**
 * Best-effort classification of a worker's free-text reply.
 * Never throws; anything unrecognised comes back as text.
 */
export function parseReply(body: string): ParsedReply {
    const orderId = ORDER_ID.exec(body);
    if (orderId) {
        return { kind: 'order', orderId: orderId[1] };
    }

    const status = extractStatus(body);
    if (status !== LogisticsStatus.STATUS_UNKNOWN) {
        const ref = ORDER_REF.exec(body);
        return ref ? { kind: 'logistics', status, orderId: ref[1] } : { kind: 'logistics', status };
    }

    const inventory = INVENTORY.exec(body);
    if (inventory) {
        const quantity = Number(inventory[1].replace(/,/g, ''));
        if (Number.isFinite(quantity)) {
            return { kind: 'inventory', quantity, unit: inventory[2].trim().toLowerCase() };
        }
    }

    return { kind: 'text', text: body.trim() };
}
