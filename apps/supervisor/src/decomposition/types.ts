import { agentTopic } from '@switchyard/sdk';
import { TaskTarget } from '../dispatch/task';
import { RunRequest } from '../supervisor/types';

export interface PlannedTask {
    target: TaskTarget;
    payload: string;
    /** Shown in aggregated output; defaults to the recipient. */
    label: string;
}

/**
 * partial: any successful subset is a usable answer.
 * strict: every task is required; one failure fails the run.
 */
export type FailureTolerance = 'partial' | 'strict';

export interface DispatchPlan {
    tasks: PlannedTask[];
    tolerance: FailureTolerance;
}

export interface Decomposer {
    decompose(request: RunRequest): DispatchPlan | Promise<DispatchPlan>;
}

export function unicast(recipient: string, payload: string, label: string = recipient): PlannedTask {
    return { target: { kind: 'unicast', recipient, topic: agentTopic(recipient) }, payload, label };
}

// One planned task per recipient, all sharing the group topic and recipient list.
export function broadcast(group: string, recipients: string[], payload: string): PlannedTask[] {
    return recipients.map((recipient): PlannedTask => ({
        target: { kind: 'broadcast', group, topic: group, recipient, recipients: [...recipients] },
        payload,
        label: recipient,
    }));
}
