/**
 * Flo strand scheduler.
 *
 * Strands are cooperative tasks on the host event loop. The scheduler owns
 * admission (an optional concurrency cap with a FIFO queue), per-strand
 * timeouts, cancellation through AbortSignal, and deadlock detection for
 * `await`.
 */
import type { Span } from "./ast.js";
import type { FloValue } from "./values.js";
import type { EmitTrace } from "./trace.js";
import { FloRuntimeError, toFloError } from "./errors.js";

export type StrandState = "queued" | "running" | "done" | "failed";

export type StrandSettlement =
  | { ok: true; value: FloValue }
  | { ok: false; error: FloRuntimeError };

export type StrandBody = (strand: Strand) => Promise<StrandSettlement>;

export class Strand {
  readonly id: number;
  readonly span?: Span;
  state: StrandState;
  /** The strand this task is currently blocked on in `await`. */
  waitingOn: Strand | null = null;
  readonly controller = new AbortController();
  readonly settled: Promise<StrandSettlement>;
  timer: ReturnType<typeof setTimeout> | null = null;

  private resolveSettled: (s: StrandSettlement) => void = () => {};
  private result: StrandSettlement | null = null;

  constructor(id: number, state: StrandState, span?: Span) {
    this.id = id;
    this.state = state;
    this.span = span;
    this.settled = new Promise((resolve) => {
      this.resolveSettled = resolve;
    });
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get settlement(): StrandSettlement | null {
    return this.result;
  }

  settle(s: StrandSettlement): boolean {
    if (this.result !== null) return false;
    this.result = s;
    this.state = s.ok ? "done" : "failed";
    this.resolveSettled(s);
    return true;
  }
}

export interface SchedulerOptions {
  /** 0 means unlimited. */
  maxConcurrent: number;
  /** 0 means no timeout. */
  timeoutMs: number;
  emit: EmitTrace;
}

/** The error a task sees once its signal has been aborted. */
export function cancellationError(signal: AbortSignal): FloRuntimeError {
  const reason: unknown = signal.reason;
  if (reason instanceof FloRuntimeError) return reason;
  return new FloRuntimeError("Cancelled", "Task was cancelled.");
}

// Statements between forced yields, so timers and I/O get a turn in busy loops.
const YIELD_EVERY = 1000;

export class StrandScheduler {
  /** The program's main task. It has no handle and is never queued. */
  readonly main: Strand;

  private nextId = 1;
  private running = 0;
  private steps = 0;
  private readonly queue: Strand[] = [];
  private readonly bodies = new Map<Strand, StrandBody>();
  private readonly live = new Set<Strand>();
  private readonly options: SchedulerOptions;

  constructor(options: SchedulerOptions) {
    this.options = options;
    this.main = new Strand(0, "running");
  }

  get activeCount(): number {
    return this.running;
  }

  get queuedCount(): number {
    return this.queue.length;
  }

  /** Count one statement; true when the caller should yield to the event loop. */
  tick(): boolean {
    this.steps++;
    return this.steps % YIELD_EVERY === 0;
  }

  spawn(body: StrandBody, span?: Span): Strand {
    const strand = new Strand(this.nextId++, "queued", span);
    this.bodies.set(strand, body);
    this.live.add(strand);
    this.options.emit("strand_spawn", span, { strand: strand.id });

    if (this.hasCapacity()) {
      this.start(strand);
    } else {
      this.queue.push(strand);
    }
    return strand;
  }

  /**
   * Block `current` until `target` settles. Throws Deadlock when the wait
   * would close a cycle, or the cancellation error when `current` is
   * cancelled while waiting. `signal` defaults to the task's own; a shielded
   * caller passes one that never aborts.
   */
  async join(current: Strand, target: Strand, signal: AbortSignal = current.signal): Promise<StrandSettlement> {
    const done = target.settlement;
    if (done !== null) return done;

    for (let s: Strand | null = target; s !== null; s = s.waitingOn) {
      if (s === current) {
        throw new FloRuntimeError(
          "Deadlock",
          `Awaiting strand #${target.id} would deadlock.`,
          undefined,
          { strand: target.id }
        );
      }
    }

    // An awaited strand jumps the queue.
    if (target.state === "queued") {
      this.start(target);
    }

    current.waitingOn = target;
    try {
      return await raceAbort(target.settled, signal);
    } finally {
      current.waitingOn = null;
    }
  }

  cancel(strand: Strand, reason: FloRuntimeError): void {
    if (strand.settlement !== null) return;
    this.options.emit("strand_cancel", strand.span, { strand: strand.id, reason: reason.kind });
    if (strand.state === "queued") {
      const idx = this.queue.indexOf(strand);
      if (idx >= 0) this.queue.splice(idx, 1);
      this.finish(strand, { ok: false, error: reason });
      return;
    }
    strand.controller.abort(reason);
  }

  cancelAll(message: string): void {
    for (const strand of [...this.live]) {
      this.cancel(strand, new FloRuntimeError("Cancelled", message, strand.span));
    }
  }

  /** Resolves once every spawned strand, including late spawns, has settled. */
  async drain(): Promise<void> {
    while (this.live.size > 0) {
      await Promise.all([...this.live].map((s) => s.settled));
    }
  }

  private hasCapacity(): boolean {
    return this.options.maxConcurrent === 0 || this.running < this.options.maxConcurrent;
  }

  private start(strand: Strand): void {
    const body = this.bodies.get(strand);
    if (strand.state !== "queued" || body === undefined) return;
    const idx = this.queue.indexOf(strand);
    if (idx >= 0) this.queue.splice(idx, 1);

    strand.state = "running";
    this.running++;
    this.options.emit("strand_start", strand.span, { strand: strand.id });

    if (this.options.timeoutMs > 0) {
      const timeoutMs = this.options.timeoutMs;
      strand.timer = setTimeout(() => {
        this.cancel(
          strand,
          new FloRuntimeError(
            "StrandTimeout",
            `Strand #${strand.id} exceeded ${timeoutMs}ms.`,
            strand.span,
            { strand: strand.id, timeoutMs }
          )
        );
      }, timeoutMs);
      strand.timer.unref();
    }

    // The body begins on a later microtask, after the creator has its handle.
    void Promise.resolve()
      .then(() => body(strand))
      .then(
        (s) => this.finish(strand, s),
        (e: unknown) => this.finish(strand, { ok: false, error: toFloError(e) })
      );
  }

  private finish(strand: Strand, s: StrandSettlement): void {
    const wasRunning = strand.state === "running";
    if (!strand.settle(s)) return;

    if (strand.timer !== null) {
      clearTimeout(strand.timer);
      strand.timer = null;
    }
    this.bodies.delete(strand);
    this.live.delete(strand);
    if (wasRunning) this.running--;

    this.options.emit(
      "strand_end",
      strand.span,
      s.ok
        ? { strand: strand.id, outcome: "ok" }
        : { strand: strand.id, outcome: "err", error: s.error.kind, message: s.error.message }
    );

    while (this.queue.length > 0 && this.hasCapacity()) {
      const next = this.queue.shift();
      if (next !== undefined) this.start(next);
    }
  }
}

function raceAbort<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) return Promise.reject(cancellationError(signal));
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(cancellationError(signal));
    signal.addEventListener("abort", onAbort, { once: true });
    promise.then(
      (v) => {
        signal.removeEventListener("abort", onAbort);
        resolve(v);
      },
      (e: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(e);
      }
    );
  });
}
