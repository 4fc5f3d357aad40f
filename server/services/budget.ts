import { setImmediate as yieldToEventLoop } from "timers/promises";
import { CorrelationCancelledError, CorrelationTimeoutError } from "./errors";

/** Deadline plus cancellation for one trigger's correlation and diagnosis. */
export interface WorkBudget {
  budgetMs: number;
  deadline: number;
  now: () => number;
  signal?: AbortSignal;
}

export function createWorkBudget(
  startedAt: number,
  budgetMs: number,
  now: () => number,
  signal?: AbortSignal,
): WorkBudget {
  return { budgetMs, deadline: startedAt + budgetMs, now, signal };
}

export function checkpoint(budget: WorkBudget, stage: string): void {
  if (budget.signal?.aborted) {
    const reason = budget.signal.reason;
    throw new CorrelationCancelledError(
      typeof reason === "string" ? reason : `Cancelled during ${stage}`,
    );
  }
  if (budget.now() > budget.deadline) {
    throw new CorrelationTimeoutError(budget.budgetMs, stage);
  }
}

/** Lets other triggers run, then re-checks the budget. */
export async function yieldCheckpoint(budget: WorkBudget, stage: string): Promise<void> {
  await yieldToEventLoop();
  checkpoint(budget, stage);
}
