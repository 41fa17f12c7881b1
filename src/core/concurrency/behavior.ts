// src/core/concurrency/behavior.ts
// BehaviorHandle: one suspended execution of a free-roam method

import { ExecutionError } from "../errors";
import { scriptFailure } from "../vm/engine";
import { parseSuspension, type Suspension } from "./suspension";

export type BehaviorStatus = "fresh" | "suspended" | "completed" | "failed";

export type BehaviorStep = { done: true } | { done: false; suspension: Suspension };

export class BehaviorHandle {
  private state: BehaviorStatus = "fresh";
  private pending?: Suspension;
  private returned?: unknown;

  constructor(
    /** `module:library#method`, used in errors */
    public readonly unit: string,
    private readonly generator: Generator<unknown, unknown, unknown>
  ) {}

  get status(): BehaviorStatus {
    return this.state;
  }

  get isTerminal(): boolean {
    return this.state === "completed" || this.state === "failed";
  }

  /** Suspension the handle is parked on, if any */
  get suspension(): Suspension | undefined {
    return this.pending;
  }

  /** Return value of a completed behavior */
  get result(): unknown {
    return this.returned;
  }

  resume(payload: unknown): BehaviorStep {
    if (this.isTerminal) {
      throw new ExecutionError(this.unit, `cannot resume a ${this.state} behavior`, "");
    }

    let step: IteratorResult<unknown, unknown>;
    try {
      step = this.generator.next(payload);
    } catch (e) {
      this.fail();
      throw scriptFailure(this.unit, e);
    }

    if (step.done) {
      this.state = "completed";
      this.pending = undefined;
      this.returned = step.value;
      return { done: true };
    }

    let suspension: Suspension;
    try {
      suspension = parseSuspension(step.value);
    } catch (e) {
      this.fail();
      throw e;
    }
    this.state = "suspended";
    this.pending = suspension;
    return { done: false, suspension };
  }

  private fail(): void {
    this.state = "failed";
    this.pending = undefined;
  }
}
