import { taskStatus } from '../dispatch/task';

export class InvalidTransitionError extends Error {
    readonly code = 'INVALID_TRANSITION';

    constructor(
        public readonly taskId: string,
        public readonly from: taskStatus | undefined,
        public readonly to: taskStatus,
        reason?: string,
    ) {
        super(`Invalid transition for task ${taskId}: ${from ?? 'unknown'} -> ${to}${reason ? ` (${reason})` : ''}`);
        this.name = 'InvalidTransitionError';
    }
}
