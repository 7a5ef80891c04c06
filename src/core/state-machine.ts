import type { JobPhase } from "../types/job.js";

/**
 * Events that drive a job through its phases.
 */
export type JobEvent = "start" | "provisioned" | "steps_finished" | "cancel" | "collect" | "collected";

export const TERMINAL_PHASE: JobPhase = "done";

/**
 * Legal edges. `cancel` is accepted from every non-terminal phase;
 * `collecting` is entered on the way to `done` from both running and cancelling.
 */
const TRANSITIONS: Record<JobPhase, Partial<Record<JobEvent, JobPhase>>> = {
  pending: { start: "provisioning", cancel: "cancelling" },
  provisioning: { provisioned: "running", cancel: "cancelling" },
  running: { steps_finished: "collecting", cancel: "cancelling" },
  cancelling: { collect: "collecting", cancel: "cancelling" },
  collecting: { collected: "done", cancel: "collecting" },
  done: {},
};

export function isTerminal(phase: JobPhase): boolean {
  return phase === TERMINAL_PHASE;
}

/**
 * Pure function: given current phase + event, return the next phase.
 * Cancelling while already collecting keeps collecting, so the artifact and
 * cleanup guarantees still hold.
 */
export function nextPhase(current: JobPhase, event: JobEvent): JobPhase {
  const next = TRANSITIONS[current][event];
  if (next === undefined) {
    throw new Error(`Illegal job transition: ${current} --${event}-->`);
  }
  return next;
}
