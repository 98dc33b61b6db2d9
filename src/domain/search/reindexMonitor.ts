import { logEvent } from "@infrastructure/logging/Logger";
import { InfrastructureError } from "@middleware/errorHandler";
import { delay, type Sleep } from "@utils/delay";

import type { SearchEnginePort } from "./ports";

export interface WaitForTaskOptions {
  pollIntervalMs?: number;
  /** Unbounded when omitted. */
  timeoutMs?: number;
  sleep?: Sleep;
  now?: () => number;
}

/**
 * Polls a background engine task until it reports completion.
 * Resolves with the number of polls it took.
 */
export async function waitForTask(
  engine: SearchEnginePort,
  taskId: string,
  options: WaitForTaskOptions = {}
): Promise<number> {
  const {
    pollIntervalMs = 1000,
    timeoutMs,
    sleep = delay,
    now = Date.now,
  } = options;
  const startedAt = now();
  let polls = 0;

  while (true) {
    const status = await engine.getTask(taskId);
    polls += 1;

    if (status.completed) {
      if (status.error) {
        throw new InfrastructureError(
          `Task ${taskId} failed: ${status.error}`,
          502,
          { taskId }
        );
      }
      logEvent("TASK_COMPLETED", { taskId, polls });
      return polls;
    }

    if (timeoutMs !== undefined && now() - startedAt >= timeoutMs) {
      throw new InfrastructureError(
        `Task ${taskId} did not complete within ${timeoutMs}ms`,
        504,
        { taskId, polls }
      );
    }

    logEvent("TASK_PENDING", { taskId, polls });
    await sleep(pollIntervalMs);
  }
}
