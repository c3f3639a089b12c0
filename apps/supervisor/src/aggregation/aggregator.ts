import { isTerminal, Task, taskStatus } from '../dispatch/task';
import { FailureTolerance } from '../decomposition/types';
import { AggregatedResult, RunFailure, Summarizer, TaskOutcome } from './types';

export interface AggregationInput {
    runId: string;
    sessionId: string;
    /** In dispatch order. */
    tasks: Task[];
    tolerance: FailureTolerance;
    summarizer: Summarizer;
    /** Set when the run was closed before every task finished. */
    interruption?: RunFailure;
}

export function toOutcome(task: Task): TaskOutcome {
    const outcome: TaskOutcome = {
        taskId: task.id,
        recipient: task.target.recipient,
        label: task.label,
        status: task.status,
        attempts: task.attempt,
    };
    if (task.result !== undefined) outcome.result = task.result;
    if (task.error) outcome.error = task.error;
    if (task.receivedAt) outcome.receivedAt = task.receivedAt;
    return outcome;
}

function failureNote(failed: Task[]): string {
    const lines = failed.map(t => `- ${t.label} (attempts: ${t.attempt}): ${t.error?.message ?? 'unknown error'}`);
    return `Failed to process:\n${lines.join('\n')}`;
}

function joinSections(sections: string[]): string {
    return sections.filter(s => s.length > 0).join('\n\n');
}

/**
 * Builds the single answer for a run. Never rejects: every failure mode is
 * reported as an error code on the result.
 */
export async function aggregate(input: AggregationInput): Promise<AggregatedResult> {
    const { runId, sessionId, tasks, tolerance, summarizer, interruption } = input;
    const outcomes = tasks.map(toOutcome);
    const succeeded = tasks.filter(t => t.status === taskStatus.SUCCEEDED);
    const failed = tasks.filter(t => isTerminal(t.status) && t.status !== taskStatus.SUCCEEDED);

    const result = (status: AggregatedResult['status'], response: string, error?: RunFailure): AggregatedResult => {
        const out: AggregatedResult = { runId, sessionId, status, partial: false, response, tasks: outcomes };
        if (error) out.error = error;
        return out;
    };

    if (interruption) {
        const incomplete = tasks.filter(t => !isTerminal(t.status)).length;
        const finished = succeeded.map(t => `${t.label} : ${t.result ?? ''}`).join('\n');
        const reason = interruption.code === 'RUN_DEADLINE_EXCEEDED' ? 'before the deadline' : 'before the supervisor stopped';
        const response = joinSections([
            finished,
            failed.length > 0 ? failureNote(failed) : '',
            `Incomplete: ${incomplete} task(s) did not finish ${reason}.`,
        ]);
        return { ...result('error', response, interruption), partial: true };
    }

    if (succeeded.length === 0) {
        const error: RunFailure = { code: 'ALL_TASKS_FAILED', message: `All ${tasks.length} task(s) failed.` };
        if (tasks.length === 1) {
            const only = tasks[0];
            return result('error', `Failed to reach ${only.label}: ${only.error?.message ?? 'unknown error'}`, error);
        }
        return result('error', failureNote(failed), error);
    }

    if (tasks.length === 1) {
        return result('complete', succeeded[0].result ?? '');
    }

    let merged: string;
    try {
        merged = await summarizer.merge(succeeded.map(t => ({
            label: t.label,
            recipient: t.target.recipient,
            text: t.result ?? '',
        })));
    } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        return result('error', `Failed to aggregate results: ${message}`, { code: 'AGGREGATION_FAILED', message });
    }

    const response = joinSections([merged, failed.length > 0 ? failureNote(failed) : '']);
    if (tolerance === 'strict' && failed.length > 0) {
        return result('error', response, {
            code: 'REQUIRED_TASK_FAILED',
            message: `${failed.length} required task(s) failed: ${failed.map(t => t.label).join(', ')}`,
        });
    }
    return result('complete', response);
}
