// =============================================================================
// FLEETLINK ENDPOINT - Task Runner
// =============================================================================
// The work behind EXECUTE_TASK. A task is an opaque id; whatever the runner
// resolves with is sent back as the TASK_COMPLETED result.
// =============================================================================

import { sleep } from '@fleetlink/protocol';

export interface TaskRunner {
    /**
     * Run task `taskId`. `signal` aborts when the coordinator sends STOP_TASK
     * or the connection drops; the result is discarded in that case.
     */
    run(taskId: string, signal: AbortSignal): Promise<string>;
}

export const TASK_COMPLETED_RESULT = 'Task completed successfully';

/**
 * Stand-in workload: holds the endpoint busy for a fixed time.
 */
export class TimedTaskRunner implements TaskRunner {
    constructor(private readonly durationMs: number) {}

    async run(_taskId: string, signal: AbortSignal): Promise<string> {
        await sleep(this.durationMs, signal);
        return TASK_COMPLETED_RESULT;
    }
}
