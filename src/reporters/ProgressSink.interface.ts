export type TaskId = number;

export interface ProgressSink {
  addTask(description: string, total: number): TaskId;
  advance(taskId: TaskId, amount?: number): void;
  removeTask(taskId: TaskId): void;
  stop(): void;
}
