import type { PublisherState } from "./publisher.js";
import type { Publisher } from "./types.js";

interface Task {
  name: string;
  run: () => Promise<void>;
  pending: boolean;
}

/**
 * Drives a publisher's periodic hooks. Each task runs once on start and then
 * on its interval. Runs never overlap: a task that is due while another one is
 * in flight waits for it, and a tick is skipped while the same task is still
 * pending.
 */
export class Scheduler {
  private timers: ReturnType<typeof setInterval>[] = [];
  private tasks = new Map<string, Task>();
  private inFlight = 0;
  private tail: Promise<void> = Promise.resolve();

  constructor(
    private publisher: Publisher,
    private pub: PublisherState,
  ) {}

  start(): void {
    this.schedule("update", this.publisher.updateInterval, () => this.publisher.update(this.pub));

    const { forecastInterval } = this.publisher;
    if (this.publisher.updateForecast && forecastInterval !== undefined) {
      const updateForecast = this.publisher.updateForecast.bind(this.publisher);
      this.schedule("forecast", forecastInterval, () => updateForecast(this.pub));
    }
  }

  /** Run the update task now. Resolves false if it was already pending. */
  async runUpdate(): Promise<boolean> {
    const task = this.tasks.get("update");
    if (!task) {
      await this.publisher.update(this.pub);
      return true;
    }
    return this.tick(task);
  }

  stop(): void {
    for (const timer of this.timers) clearInterval(timer);
    this.timers = [];
    this.tasks.clear();
  }

  private schedule(name: string, interval: number, run: () => Promise<void>): void {
    const task: Task = { name, run, pending: false };
    this.tasks.set(name, task);

    const onTick = () => {
      this.tick(task).catch((err) => {
        console.error(`[Scheduler] ${task.name} failed:`, err instanceof Error ? err.message : String(err));
      });
    };
    onTick();
    this.timers.push(setInterval(onTick, interval));
  }

  private tick(task: Task): Promise<boolean> {
    if (task.pending) return Promise.resolve(false);
    task.pending = true;

    // Start right away when idle, otherwise queue behind the running task
    const run = this.inFlight === 0 ? task.run() : this.tail.then(() => task.run());
    this.inFlight++;

    const done = run.finally(() => {
      task.pending = false;
      this.inFlight--;
    });
    // The queue only orders runs; each run's failure reaches its own caller
    this.tail = done.then(
      () => undefined,
      () => undefined,
    );
    return done.then(() => true);
  }
}
