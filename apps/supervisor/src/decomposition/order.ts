import { InvalidRequestError } from '../errors/run.errors';

export interface OrderTerms {
    price: number;
    quantity: number;
}

const ORDER_INTENT = /\b(order|buy|purchase)\b/i;
const LOOKUP_INTENT = /\b(status|details?|track(?:ing)?)\b/i;
// Order ids always carry a digit, which keeps "order id" itself from matching.
const ORDER_ID = /\border\s+(?:id\s*[:#]?\s*)?#?([A-Za-z0-9-]*\d[A-Za-z0-9-]*)/i;

const QUANTITY_PATTERNS = [
    /\bquantity\s*(?:of|:|=|is)?\s*(-?\d+(?:\.\d+)?)/i,
    /(-?\d+(?:\.\d+)?)\s*(?:lbs?|pounds?|kg|kilograms?|units?|bags?)\b/i,
];

const PRICE_PATTERNS = [
    /\bprice\s*(?:of|:|=|is)?\s*\$?\s*(-?\d+(?:\.\d+)?)/i,
    /\$\s*(-?\d+(?:\.\d+)?)/,
    /\bat\s+(-?\d+(?:\.\d+)?)\s*(?:per|each|\/)/i,
];

export function isOrderPrompt(prompt: string): boolean {
    return ORDER_INTENT.test(prompt);
}

/** "status of order <id>", "track order <id>" and the like. */
export function isOrderLookup(prompt: string): boolean {
    return /\border\b/i.test(prompt) && LOOKUP_INTENT.test(prompt);
}

export function parseOrderId(prompt: string): string {
    const match = ORDER_ID.exec(prompt);
    if (!match) {
        throw new InvalidRequestError('No order ID provided. Please specify an order ID.');
    }
    return match[1];
}

function firstNumber(prompt: string, patterns: RegExp[]): number {
    for (const pattern of patterns) {
        const match = pattern.exec(prompt);
        if (match) return Number(match[1]);
    }
    return 0;
}

/** Extracts price and quantity; both must be present and positive. */
export function parseOrderTerms(prompt: string): OrderTerms {
    const quantity = firstNumber(prompt, QUANTITY_PATTERNS);
    const price = firstNumber(prompt, PRICE_PATTERNS);
    if (!(price > 0) || !(quantity > 0)) {
        throw new InvalidRequestError('Price and quantity must both be greater than zero.');
    }
    return { price, quantity };
}
