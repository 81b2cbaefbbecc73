/**
 * Pipeline run state machine.
 *
 *   initialized → data_loaded → plots_generated → reports_rendered → finalized
 *
 * Any non-terminal state may also move to failed.
 */

import { PipelineState } from "../types/pipeline.js";

export const VALID_PIPELINE_TRANSITIONS: Readonly<Record<PipelineState, readonly PipelineState[]>> = {
  [PipelineState.Initialized]: [PipelineState.DataLoaded, PipelineState.Failed],
  [PipelineState.DataLoaded]: [PipelineState.PlotsGenerated, PipelineState.Failed],
  [PipelineState.PlotsGenerated]: [PipelineState.ReportsRendered, PipelineState.Failed],
  [PipelineState.ReportsRendered]: [PipelineState.Finalized, PipelineState.Failed],
  [PipelineState.Finalized]: [],
  [PipelineState.Failed]: [],
};

/** Result of a state transition attempt. */
export interface TransitionResult {
  success: boolean;
  newState?: PipelineState;
  error?: string;
}

export function transitionPipelineState(
  current: PipelineState,
  target: PipelineState
): TransitionResult {
  const validTargets = VALID_PIPELINE_TRANSITIONS[current];
  if (!validTargets.includes(target)) {
    return {
      success: false,
      error: `Invalid pipeline state transition: ${current} -> ${target}`,
    };
  }
  return { success: true, newState: target };
}

export function isTerminalPipelineState(state: PipelineState): boolean {
  return state === PipelineState.Finalized || state === PipelineState.Failed;
}
