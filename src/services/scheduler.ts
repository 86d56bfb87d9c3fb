import { errorMessage } from "../utils/guards.js";
import { type LogSink, createLogger } from "../utils/logger.js";
import { sleep } from "../utils/sleep.js";

export type SchedulerState = "idle" | "running" | "stopping" | "stopped";

export interface LoopDefinition {
  name: string;
  intervalMs: number;
  unit: (signal: AbortSignal) => Promise<void>;
}

export interface LoopFailure {
  loop: string;
  error: string;
  at: string;
}

export interface StopResult {
  timedOut: boolean;
}

/**
 * 폴링 루프 스케줄러
 *
 * Each loop runs one unit of work, then sleeps its interval, until stopped.
 * A stop aborts the shared signal, which wakes sleeping loops; a unit that
 * is already running is allowed to finish within the stop timeout.
 */
export class LoopScheduler {
  private readonly logger: LogSink;
  private readonly stopTimeoutMs: number;
  private currentState: SchedulerState = "idle";
  private controller: AbortController | null = null;
  private tasks: Promise<void>[] = [];
  private readonly loopFailures: LoopFailure[] = [];

  constructor(options: { stopTimeoutMs?: number; logger?: LogSink } = {}) {
    this.stopTimeoutMs = Math.max(0, options.stopTimeoutMs ?? 5000);
    this.logger = options.logger ?? createLogger("scheduler");
  }

  get state(): SchedulerState {
    return this.currentState;
  }

  get failures(): readonly LoopFailure[] {
    return this.loopFailures;
  }

  /**
   * 스케줄러 시작
   */
  start(loops: LoopDefinition[]): boolean {
    if (this.currentState === "running" || this.currentState === "stopping") {
      this.logger.warn({ state: this.currentState }, "Scheduler is already running");
      return false;
    }

    const controller = new AbortController();
    this.controller = controller;
    this.currentState = "running";
    this.logger.info({ loops: loops.map((loop) => `${loop.name}:${loop.intervalMs}ms`) }, "Scheduler started");

    this.tasks = loops.map((loop) => this.supervise(loop, controller.signal));
    return true;
  }

  /**
   * 스케줄러 중지 (제한 시간 안에 루프 합류)
   */
  async stop(): Promise<StopResult> {
    if (this.currentState !== "running") {
      return { timedOut: false };
    }

    this.currentState = "stopping";
    this.controller?.abort();

    const timer = new AbortController();
    const joined = Promise.allSettled(this.tasks).then(() => "joined" as const);
    const expired = sleep(this.stopTimeoutMs, timer.signal).then(() => "timeout" as const);
    const outcome = await Promise.race([joined, expired]);
    timer.abort();

    this.tasks = [];
    this.controller = null;
    this.currentState = "stopped";

    const timedOut = outcome === "timeout";
    if (timedOut) {
      this.logger.warn({ stopTimeoutMs: this.stopTimeoutMs }, "Loops did not finish before the stop timeout");
    } else {
      this.logger.info({}, "Scheduler stopped");
    }
    return { timedOut };
  }

  private supervise(loop: LoopDefinition, signal: AbortSignal): Promise<void> {
    return this.runLoop(loop, signal).catch((error: unknown) => {
      const failure = { loop: loop.name, error: errorMessage(error), at: new Date().toISOString() };
      this.loopFailures.push(failure);
      this.logger.error(failure, "Loop terminated unexpectedly");
    });
  }

  private async runLoop(loop: LoopDefinition, signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      try {
        await loop.unit(signal);
      } catch (error) {
        this.logger.error({ loop: loop.name, err: errorMessage(error) }, "Loop iteration failed");
      }

      if (signal.aborted) break;
      const slept = await sleep(loop.intervalMs, signal);
      if (!slept) break;
    }
    this.logger.debug({ loop: loop.name }, "Loop exited");
  }
}
