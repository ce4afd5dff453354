/**
 * Resolution steps in order.
 */
export const RESOLUTION_STEPS = [
  "resolving_version",
  "fetching_graph",
  "computing_hashes",
  "writing_manifest",
] as const;

export type ResolutionStep = (typeof RESOLUTION_STEPS)[number];

/**
 * Idle, in-progress, and terminal states.
 */
export type RunStatus = "idle" | ResolutionStep | "done" | `failed_${ResolutionStep}`;

/**
 * Events that drive state transitions.
 */
export type TransitionEvent = "start" | "success" | "failure";

export function isResolutionStep(status: RunStatus): status is ResolutionStep {
  return RESOLUTION_STEPS.some((s) => s === status);
}

export function isTerminal(status: RunStatus): boolean {
  return status === "done" || status.startsWith("failed_");
}

/** The step a `failed_*` status failed at, or null for any other status. */
export function failedStep(status: RunStatus): ResolutionStep | null {
  if (!status.startsWith("failed_")) return null;
  const step = RESOLUTION_STEPS.find((s) => status === `failed_${s}`);
  return step ?? null;
}

/**
 * Pure function: given current status + event, return next status.
 * Throws on transitions the machine does not define.
 */
export function nextState(current: RunStatus, event: TransitionEvent): RunStatus {
  if (current === "idle") {
    if (event === "start") return RESOLUTION_STEPS[0];
    throw new Error(`Invalid transition: ${event} from idle`);
  }
  if (!isResolutionStep(current) || event === "start") {
    throw new Error(`Invalid transition: ${event} from ${current}`);
  }
  if (event === "failure") return `failed_${current}`;

  const idx = RESOLUTION_STEPS.indexOf(current);
  return idx >= RESOLUTION_STEPS.length - 1 ? "done" : RESOLUTION_STEPS[idx + 1];
}
