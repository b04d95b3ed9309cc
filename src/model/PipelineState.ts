export type PipelineState =
  | 'INIT'
  | 'EXTRACTING'
  | 'MERGING'
  | 'PERSISTING'
  | 'SYNCING'
  | 'REPORTING'
  | 'DONE'
  | 'FAILED';

const NEXT_STATE: Record<PipelineState, PipelineState | null> = {
  INIT: 'EXTRACTING',
  EXTRACTING: 'MERGING',
  MERGING: 'PERSISTING',
  PERSISTING: 'SYNCING',
  SYNCING: 'REPORTING',
  REPORTING: 'DONE',
  DONE: null,
  FAILED: null,
};

export function isTerminal(state: PipelineState): boolean {
  return NEXT_STATE[state] === null;
}

/**
 * States only move forward one step at a time; FAILED is reachable from any non-terminal state.
 */
export function canTransition(from: PipelineState, to: PipelineState): boolean {
  if (isTerminal(from)) {
    return false;
  }
  return to === 'FAILED' || NEXT_STATE[from] === to;
}
