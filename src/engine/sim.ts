import type { GridBounds } from './grid';
import type { RoverAction, RoverState } from './rover';
import { step } from './rules';

export interface RunTrace {
  states: RoverState[];
  final: RoverState;
  appliedCount: number;
  ignoredCount: number;
}

export const run = (
  grid: GridBounds,
  initialState: RoverState,
  actions: readonly RoverAction[],
): RoverState => {
  let state = initialState;

  for (const action of actions) {
    if (state.lost) {
      return state;
    }
    state = step(grid, state, action);
  }

  return state;
};

export const runWithTrace = (
  grid: GridBounds,
  initialState: RoverState,
  actions: readonly RoverAction[],
): RunTrace => {
  const states: RoverState[] = [initialState];
  let state = initialState;
  let appliedCount = 0;

  for (const action of actions) {
    if (state.lost) {
      break;
    }
    state = step(grid, state, action);
    states.push(state);
    appliedCount += 1;
  }

  return {
    states,
    final: state,
    appliedCount,
    ignoredCount: actions.length - appliedCount,
  };
};
