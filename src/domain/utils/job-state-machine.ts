import type { JobStatus } from "../enums/job.status";

// queued -> processing -> {paused <-> processing} -> {completed | error}
const TRANSITIONS: Record<JobStatus, readonly JobStatus[]> = {
  queued: ["processing", "error"],
  processing: ["paused", "completed", "error"],
  paused: ["processing", "error"],
  completed: [],
  error: [],
};

export function canTransition(from: JobStatus, to: JobStatus): boolean {
  // Same-status updates (progress, message, claim) are not transitions
  if (from === to) {
    return true;
  }
  return TRANSITIONS[from].includes(to);
}

export function isTerminal(status: JobStatus): boolean {
  return TRANSITIONS[status].length === 0;
}
