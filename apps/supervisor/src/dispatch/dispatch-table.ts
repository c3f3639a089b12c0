import { InvalidTransitionError } from '../errors/invalid-transition.error';
import { isTerminal, Task, taskStatus } from './task';

const ALLOWED: Record<taskStatus, readonly taskStatus[]> = {
    [taskStatus.PENDING]: [taskStatus.IN_FLIGHT, taskStatus.FAILED],
    [taskStatus.IN_FLIGHT]: [taskStatus.SUCCEEDED, taskStatus.PENDING, taskStatus.FAILED, taskStatus.TIMED_OUT],
    [taskStatus.SUCCEEDED]: [],
    [taskStatus.FAILED]: [],
    [taskStatus.TIMED_OUT]: [],
};

export type TaskPatch = Partial<Pick<Task, 'attempt' | 'result' | 'error' | 'lastError' | 'dispatchedAt' | 'receivedAt' | 'completedAt'>>;

/**
 * Per-run table of tasks keyed by id, kept in dispatch order.
 * Every status change goes through transition(); illegal moves throw and
 * leave the task untouched.
 */
export class DispatchTable {
    private readonly entries = new Map<string, Task>();

    put(task: Task): void {
        if (this.entries.has(task.id)) {
            throw new Error(`Task ${task.id} is already in the dispatch table`);
        }
        this.entries.set(task.id, { ...task });
    }

    get(taskId: string): Task | undefined {
        return this.entries.get(taskId);
    }

    transition(taskId: string, next: taskStatus, patch: TaskPatch = {}): Task {
        const task = this.entries.get(taskId);
        if (!task) {
            throw new InvalidTransitionError(taskId, undefined, next, 'unknown task');
        }
        if (!ALLOWED[task.status].includes(next)) {
            throw new InvalidTransitionError(taskId, task.status, next);
        }

        const attempt = patch.attempt ?? task.attempt;
        if (next === taskStatus.IN_FLIGHT && attempt > task.maxAttempts) {
            throw new InvalidTransitionError(taskId, task.status, next, `attempt ${attempt} exceeds ${task.maxAttempts}`);
        }
        if (task.status === taskStatus.IN_FLIGHT && next === taskStatus.PENDING && task.attempt >= task.maxAttempts) {
            throw new InvalidTransitionError(taskId, task.status, next, 'no attempts left');
        }

        const updated: Task = { ...task, ...patch, status: next };
        this.entries.set(taskId, updated);
        return updated;
    }

    allTerminal(): boolean {
        for (const task of this.entries.values()) {
            if (!isTerminal(task.status)) return false;
        }
        return true;
    }

    // Tasks waiting out a retry delay.
    pendingForRetry(): Task[] {
        return this.tasks().filter(t => t.status === taskStatus.PENDING && t.attempt > 0);
    }

    tasks(): Task[] {
        return Array.from(this.entries.values());
    }

    get size(): number {
        return this.entries.size;
    }
}
