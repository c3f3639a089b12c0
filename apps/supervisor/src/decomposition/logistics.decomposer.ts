import { v7 as uuidv7 } from 'uuid';
import { InvalidRequestError } from '../errors/run.errors';
import { RunRequest } from '../supervisor/types';
import { LogisticsStatus } from './logistics-status';
import { isOrderPrompt, parseOrderTerms } from './order';
import { Decomposer, DispatchPlan, PlannedTask } from './types';

export interface LogisticsStep {
    status: LogisticsStatus;
    recipient: string;
}

export const FULFILMENT_STEPS: readonly LogisticsStep[] = [
    { status: LogisticsStatus.RECEIVED_ORDER, recipient: 'farm' },
    { status: LogisticsStatus.HANDOVER_TO_SHIPPER, recipient: 'shipper' },
    { status: LogisticsStatus.CUSTOMS_CLEARANCE, recipient: 'shipper' },
    { status: LogisticsStatus.PAYMENT_COMPLETE, recipient: 'accountant' },
    { status: LogisticsStatus.DELIVERED, recipient: 'shipper' },
];

export const LOGISTICS_AGENTS = ['farm', 'shipper', 'accountant'];

export interface LogisticsDecomposerOptions {
    groupTopic?: string;
    idGenerator?: () => string;
}

/**
 * Fulfilment profile: an order becomes one task per milestone, all sent on
 * the logistics group topic. Every step is required.
 */
export class LogisticsDecomposer implements Decomposer {
    private readonly groupTopic: string;
    private readonly nextOrderId: () => string;

    constructor(options: LogisticsDecomposerOptions = {}) {
        this.groupTopic = options.groupTopic ?? 'logistics_group';
        this.nextOrderId = options.idGenerator ?? uuidv7;
    }

    decompose(request: RunRequest): DispatchPlan {
        if (!isOrderPrompt(request.prompt)) {
            throw new InvalidRequestError('Logistics requests must describe an order to fulfil.');
        }
        const { price, quantity } = parseOrderTerms(request.prompt);
        const orderId = this.nextOrderId();

        const tasks = FULFILMENT_STEPS.map((step): PlannedTask => {
            const payload = `${step.status} | Supervisor -> ${step.recipient}: Order ${orderId} with price ${price} and quantity ${quantity}.`;
            return {
                target: {
                    kind: 'broadcast',
                    group: this.groupTopic,
                    topic: this.groupTopic,
                    recipient: step.recipient,
                    recipients: [...LOGISTICS_AGENTS],
                },
                payload,
                label: `${step.status} (${step.recipient})`,
            };
        });
        return { tasks, tolerance: 'strict' };
    }
}
