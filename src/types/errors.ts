import type { ResourceKind, TaskDescriptor, TaskHandle } from './index';

export type TestbedErrorCode =
  | 'CONFIGURATION_ERROR'
  | 'DEPENDENCY_NOT_RESOLVED'
  | 'REMOTE_OPERATION_FAILED'
  | 'RESOURCE_NOT_FOUND'
  | 'OPERATION_NOT_SUPPORTED'
  | 'TASK_FAILED'
  | 'TASK_TIMEOUT'
  | 'ROLE_PROVISIONING_FAILED';

export class TestbedError extends Error {
  readonly code: TestbedErrorCode;

  constructor(code: TestbedErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ConfigurationError extends TestbedError {
  readonly problems: string[];

  constructor(message: string, problems: string[] = []) {
    super('CONFIGURATION_ERROR', problems.length > 0 ? `${message}:\n${problems.join('\n')}` : message);
    this.problems = problems;
  }
}

/**
 * Raised when a provisioning step runs before the handle it builds on has been
 * resolved, e.g. creating a VDC with no organization in the context.
 */
export class DependencyNotResolvedError extends TestbedError {
  readonly dependency: string;

  constructor(dependency: string, step?: string) {
    super(
      'DEPENDENCY_NOT_RESOLVED',
      step
        ? `Cannot run ${step}: missing dependency ${dependency}`
        : `Missing dependency ${dependency}`
    );
    this.dependency = dependency;
  }
}

export interface RemoteErrorDetails {
  status?: number;
  majorErrorCode?: number;
  minorErrorCode?: string;
  cause?: unknown;
}

export class RemoteOperationError extends TestbedError {
  readonly status?: number;
  readonly majorErrorCode?: number;
  readonly minorErrorCode?: string;

  constructor(message: string, details: RemoteErrorDetails = {}, code: TestbedErrorCode = 'REMOTE_OPERATION_FAILED') {
    super(code, message, { cause: details.cause });
    this.status = details.status;
    this.majorErrorCode = details.majorErrorCode;
    this.minorErrorCode = details.minorErrorCode;
  }
}

export class NotFoundError extends RemoteOperationError {
  readonly kind?: ResourceKind;
  readonly resourceName?: string;

  constructor(message: string, target: { kind?: ResourceKind; name?: string } = {}, details: RemoteErrorDetails = {}) {
    super(message, { status: 404, ...details }, 'RESOURCE_NOT_FOUND');
    this.kind = target.kind;
    this.resourceName = target.name;
  }
}

export class OperationNotSupportedError extends TestbedError {
  constructor(message: string) {
    super('OPERATION_NOT_SUPPORTED', message);
  }
}

export class TaskFailedError extends TestbedError {
  readonly task: TaskDescriptor;

  constructor(task: TaskDescriptor) {
    const reason = task.errorMessage ?? task.details;
    super(
      'TASK_FAILED',
      `Task ${task.operation || task.href} finished with status ${task.status}${reason ? `: ${reason}` : ''}`
    );
    this.task = task;
  }
}

export class TaskTimeoutError extends TestbedError {
  readonly task: TaskHandle;
  readonly timeoutMs: number;

  constructor(task: TaskHandle, timeoutMs: number) {
    super('TASK_TIMEOUT', `Task ${task.href} did not finish within ${timeoutMs / 1000} seconds`);
    this.task = task;
    this.timeoutMs = timeoutMs;
  }
}

export interface RoleFailure {
  role: string;
  username: string;
  error: Error;
}

export class RoleProvisioningError extends TestbedError {
  readonly failures: RoleFailure[];

  constructor(failures: RoleFailure[]) {
    super(
      'ROLE_PROVISIONING_FAILED',
      `Failed to provision ${failures.length} user(s): ` +
        failures.map(f => `${f.username} (${f.role}): ${f.error.message}`).join('; ')
    );
    this.failures = failures;
  }
}

export function isNotFoundError(error: unknown): error is NotFoundError {
  return error instanceof NotFoundError;
}
