/** Milestones of an order's fulfilment, in the order they happen. */
export enum LogisticsStatus {
    RECEIVED_ORDER = 'RECEIVED_ORDER',
    HANDOVER_TO_SHIPPER = 'HANDOVER_TO_SHIPPER',
    CUSTOMS_CLEARANCE = 'CUSTOMS_CLEARANCE',
    PAYMENT_COMPLETE = 'PAYMENT_COMPLETE',
    DELIVERED = 'DELIVERED',
    STATUS_UNKNOWN = 'STATUS_UNKNOWN',
}

export const FULFILMENT_SEQUENCE: readonly LogisticsStatus[] = [
    LogisticsStatus.RECEIVED_ORDER,
    LogisticsStatus.HANDOVER_TO_SHIPPER,
    LogisticsStatus.CUSTOMS_CLEARANCE,
    LogisticsStatus.PAYMENT_COMPLETE,
    LogisticsStatus.DELIVERED,
];

// First known status token wins, by position in the text.
export function extractStatus(text: string): LogisticsStatus {
    let found: LogisticsStatus = LogisticsStatus.STATUS_UNKNOWN;
    let position = Number.POSITIVE_INFINITY;
    for (const status of FULFILMENT_SEQUENCE) {
        const idx = text.indexOf(status);
        if (idx !== -1 && idx < position) {
            found = status;
            position = idx;
        }
    }
    return found;
}
