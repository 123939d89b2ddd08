/**
 * Task Protocol Types
 *
 * SCOPE: the agent task protocol as seen by the task bridge. Tasks, messages,
 * artifacts and the events published while a task runs.
 */

export type TaskState =
  | 'submitted'
  | 'working'
  | 'completed'
  | 'failed'
  | 'canceled';

export const TERMINAL_TASK_STATES: readonly TaskState[] = [
  'completed',
  'failed',
  'canceled',
];

export type Part =
  | { kind: 'text'; text: string }
  | { kind: 'data'; data: Record<string, unknown> };

export interface TaskMessage {
  messageId: string;
  role: 'user' | 'agent';
  parts: Part[];
  taskId?: string;
  contextId?: string;
}

export interface TaskStatus {
  state: TaskState;
  message?: TaskMessage;
  timestamp: string;
}

export interface Artifact {
  artifactId: string;
  name: string;
  parts: Part[];
}

export interface Task {
  id: string;
  contextId: string;
  status: TaskStatus;
  history: TaskMessage[];
  artifacts: Artifact[];
}

export type TaskEvent =
  | { kind: 'task'; task: Task }
  | {
      kind: 'status-update';
      taskId: string;
      contextId: string;
      status: TaskStatus;
      final: boolean;
    }
  | {
      kind: 'artifact-update';
      taskId: string;
      contextId: string;
      artifact: Artifact;
    };

/**
 * Where the bridge publishes task events (owned by the protocol layer)
 */
export interface TaskEventBus {
  publish(event: TaskEvent): void | Promise<void>;
}

/**
 * One inbound turn, as delivered by the protocol layer
 */
export interface ExecutionRequest {
  contextId: string;
  /** Existing task when the turn continues one */
  task?: Task;
  /** Inbound message; used to create the task on first contact */
  message?: TaskMessage;
  /** Verified caller identity from the transport, if any */
  principal?: string | null;
}
