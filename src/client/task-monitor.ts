import {
  TaskDescriptor,
  TaskFailedError,
  TaskHandle,
  TaskStatus,
  TaskTimeoutError,
  TERMINAL_TASK_STATUSES
} from '../types';
import { createNullLogger, type Logger } from '../logging';

export interface TaskSource {
  getTask(task: TaskHandle): Promise<TaskDescriptor>;
}

export interface TaskMonitorOptions {
  pollIntervalMs: number;
  timeoutMs: number;
  logger?: Logger;
}

export const DEFAULT_TASK_MONITOR_OPTIONS: TaskMonitorOptions = {
  pollIntervalMs: 5000,
  timeoutMs: 600000
};

/**
 * Polls vCloud Director tasks until they reach a terminal state.
 */
export class TaskMonitor {
  private readonly pollIntervalMs: number;
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(private readonly source: TaskSource, options: TaskMonitorOptions = DEFAULT_TASK_MONITOR_OPTIONS) {
    this.pollIntervalMs = options.pollIntervalMs;
    this.timeoutMs = options.timeoutMs;
    this.logger = options.logger ?? createNullLogger();
  }

  /**
   * Wait until the task is no longer queued or running and return its final
   * state, whatever that state is.
   * @throws TaskTimeoutError when no terminal state is seen within the timeout
   */
  async waitForTerminalState(task: TaskHandle, timeoutMs: number = this.timeoutMs): Promise<TaskDescriptor> {
    const startTime = Date.now();

    for (;;) {
      const current = await this.source.getTask(task);
      this.logger.debug(`Task ${current.operation || task.href} is ${current.status}`);

      if (TERMINAL_TASK_STATUSES.has(current.status)) {
        return current;
      }

      if (Date.now() - startTime + this.pollIntervalMs > timeoutMs) {
        throw new TaskTimeoutError(task, timeoutMs);
      }

      await new Promise(resolve => setTimeout(resolve, this.pollIntervalMs));
    }
  }

  /**
   * Wait for the task and require it to succeed.
   * @throws TaskFailedError when the task ends in error, canceled or aborted
   */
  async waitForSuccess(task: TaskHandle, timeoutMs?: number): Promise<TaskDescriptor> {
    const result = await this.waitForTerminalState(task, timeoutMs);
    if (result.status !== TaskStatus.SUCCESS) {
      this.logger.error(`Task ${result.operation || task.href} finished with status ${result.status}`);
      throw new TaskFailedError(result);
    }
    return result;
  }
}
