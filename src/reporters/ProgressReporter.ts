import type { ProgressSink, TaskId } from './ProgressSink.interface.js';

export interface ProgressStream {
  isTTY?: boolean;
  columns?: number;
  write(chunk: string): boolean;
}

const COLORS = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  cyan: '\x1b[36m',
  green: '\x1b[32m',
};

const fmt = (color: keyof typeof COLORS, text: string): string =>
  `${COLORS[color]}${text}${COLORS.reset}`;

const visibleLength = (text: string): number => text.replace(/\x1b\[[0-9;]*m/g, '').length;

const REDRAW_INTERVAL_MS = 100;

interface TaskState {
  description: string;
  total: number;
  completed: number;
}

/**
 * Single status line on a TTY. The first task added is the overall one; the
 * line also shows how many others are active and the newest one's count.
 */
export class ProgressReporter implements ProgressSink {
  private enabled: boolean;
  private tasks = new Map<TaskId, TaskState>();
  private nextId: TaskId = 1;
  private overallId: TaskId | undefined;
  private lastLineLength = 0;
  private lastDrawAt = 0;

  constructor(enabled: boolean = true, private stream: ProgressStream = process.stdout) {
    this.enabled = enabled && Boolean(stream.isTTY);
  }

  addTask(description: string, total: number): TaskId {
    const id = this.nextId++;
    this.tasks.set(id, { description, total, completed: 0 });
    this.overallId ??= id;
    this.render(true);
    return id;
  }

  advance(taskId: TaskId, amount: number = 1): void {
    const task = this.tasks.get(taskId);
    if (!task) return;
    task.completed = Math.min(task.total, task.completed + amount);
    this.render(taskId === this.overallId);
  }

  removeTask(taskId: TaskId): void {
    if (taskId === this.overallId) this.overallId = undefined;
    this.tasks.delete(taskId);
    this.render(false);
  }

  complete(message: string): void {
    if (!this.enabled) return;
    this.clearLine();
    this.stream.write(fmt('green', '✓') + ` ${message}\n`);
  }

  stop(): void {
    if (!this.enabled) return;
    this.clearLine();
  }

  private render(force: boolean): void {
    if (!this.enabled) return;
    const now = Date.now();
    if (!force && now - this.lastDrawAt < REDRAW_INTERVAL_MS) return;
    this.lastDrawAt = now;

    const overall = this.overallId !== undefined ? this.tasks.get(this.overallId) : undefined;
    const parts: string[] = [];
    if (overall) {
      parts.push(`${fmt('cyan', `[${overall.completed}/${overall.total}]`)} ${overall.description}`);
    }

    const active = [...this.tasks.entries()].filter(([id]) => id !== this.overallId);
    if (active.length > 0) {
      parts.push(`${active.length} active`);
      const [, newest] = active[active.length - 1];
      parts.push(fmt('dim', `${newest.description} ${newest.completed}/${newest.total}`));
    }

    const width = (this.stream.columns ?? 120) - 1;
    let line = parts.join(' · ');
    while (parts.length > 1 && visibleLength(line) > width) {
      parts.pop();
      line = parts.join(' · ');
    }

    this.clearLine();
    this.stream.write(line);
    this.lastLineLength = visibleLength(line);
  }

  private clearLine(): void {
    if (this.lastLineLength > 0) {
      this.stream.write('\r' + ' '.repeat(this.lastLineLength) + '\r');
      this.lastLineLength = 0;
    }
  }
}
