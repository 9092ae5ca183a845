/**
 * Supervisor — runs the long-lived units of the process side by side and
 * applies a first-failure-stops-all policy.
 *
 * When any unit fails the others are aborted and the outcome is reported
 * as failed. The caller decides what the process does with that outcome
 * (index.ts exits with status 1).
 */

import type { Logger } from "../logger.js";

export interface SupervisedUnit {
  name: string;
  /** Run until `signal` aborts (resolve) or the unit cannot continue (reject) */
  run(signal: AbortSignal): Promise<void>;
}

export type SupervisorOutcome =
  | { status: "stopped"; reason: string }
  | { status: "failed"; unit: string; error: unknown };

export class Supervisor {
  private log: Logger | undefined;
  private controller: AbortController | null = null;
  private stopReason: string | null = null;

  constructor(logger?: Logger) {
    this.log = logger;
  }

  get isRunning(): boolean {
    return this.controller !== null;
  }

  /**
   * Start every unit concurrently. Settles once all units have settled:
   * "failed" with the first unit to reject, otherwise "stopped".
   */
  async run(units: SupervisedUnit[]): Promise<SupervisorOutcome> {
    if (this.controller) throw new Error("Supervisor is already running");
    const controller = new AbortController();
    this.controller = controller;
    this.stopReason = null;

    const state: { failure?: { unit: string; error: unknown } } = {};

    const runUnit = async (unit: SupervisedUnit): Promise<void> => {
      this.log?.info({ unit: unit.name }, "Unit started");
      try {
        await unit.run(controller.signal);
        if (!controller.signal.aborted) {
          throw new Error(`Unit "${unit.name}" exited unexpectedly`);
        }
        this.log?.info({ unit: unit.name }, "Unit stopped");
      } catch (error) {
        if (state.failure) {
          this.log?.warn({ unit: unit.name, err: error }, "Unit failed during shutdown");
          return;
        }
        state.failure = { unit: unit.name, error };
        this.log?.error({ unit: unit.name, err: error }, "Unit failed, stopping all units");
        controller.abort();
      }
    };

    try {
      await Promise.all(units.map(runUnit));
    } finally {
      this.controller = null;
    }

    const { failure } = state;
    if (failure) return { status: "failed", unit: failure.unit, error: failure.error };
    return { status: "stopped", reason: this.stopReason ?? "stopped" };
  }

  /** Abort every running unit; `run()` then resolves with "stopped" */
  shutdown(reason: string): void {
    if (!this.controller || this.controller.signal.aborted) return;
    this.stopReason = reason;
    this.log?.info({ reason }, "Shutting down");
    this.controller.abort();
  }
}
