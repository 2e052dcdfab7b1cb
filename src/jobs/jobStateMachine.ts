// Per-job lifecycle with an explicit transition table.
import type { JobState, TerminalJobState } from "@/jobs/types";

const TRANSITIONS: Record<JobState, readonly JobState[]> = {
  idle: ["starting"],
  starting: ["running", "failed"],
  running: ["stopping", "verifying", "failed"],
  stopping: ["verifying", "failed"],
  verifying: ["completed", "failed"],
  completed: [],
  failed: []
};

export type TransitionListener = (next: JobState, previous: JobState) => void;

export class IllegalTransitionError extends Error {
  constructor(from: JobState, to: JobState) {
    super(`Illegal job transition: ${from} -> ${to}`);
    this.name = "IllegalTransitionError";
  }
}

export const isTerminalState = (state: JobState): state is TerminalJobState =>
  state === "completed" || state === "failed";

// Starting through verifying: the job still owns the session.
export const isActiveState = (state: JobState) =>
  state !== "idle" && !isTerminalState(state);

export const canTransition = (from: JobState, to: JobState) =>
  TRANSITIONS[from].includes(to);

export type JobStateMachine = {
  state: () => JobState;
  history: () => JobState[];
  transition: (next: JobState) => void;
};

export const createJobStateMachine = (
  onTransition?: TransitionListener
): JobStateMachine => {
  let current: JobState = "idle";
  const visited: JobState[] = [current];

  return {
    state: () => current,
    history: () => [...visited],
    transition: (next) => {
      if (!canTransition(current, next)) {
        throw new IllegalTransitionError(current, next);
      }
      const previous = current;
      current = next;
      visited.push(next);
      onTransition?.(next, previous);
    }
  };
};
