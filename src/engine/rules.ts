import { isInsideGrid, type GridBounds } from './grid';
import type { Heading, RoverAction, RoverState } from './rover';

export interface Position {
  x: number;
  y: number;
}

export const getForwardPosition = (position: Position, heading: Heading): Position => {
  switch (heading) {
    case 'N':
      return { x: position.x, y: position.y + 1 };
    case 'E':
      return { x: position.x + 1, y: position.y };
    case 'S':
      return { x: position.x, y: position.y - 1 };
    case 'W':
      return { x: position.x - 1, y: position.y };
    default: {
      const _exhaustive: never = heading;
      return _exhaustive;
    }
  }
};

export const turnLeft = (heading: Heading): Heading => {
  switch (heading) {
    case 'N':
      return 'W';
    case 'W':
      return 'S';
    case 'S':
      return 'E';
    case 'E':
      return 'N';
    default: {
      const _exhaustive: never = heading;
      return _exhaustive;
    }
  }
};

export const turnRight = (heading: Heading): Heading => {
  switch (heading) {
    case 'N':
      return 'E';
    case 'E':
      return 'S';
    case 'S':
      return 'W';
    case 'W':
      return 'N';
    default: {
      const _exhaustive: never = heading;
      return _exhaustive;
    }
  }
};

// No bounds check here; step() decides whether the move is fatal.
export const applyForward = (state: RoverState): RoverState => {
  const forward = getForwardPosition(state, state.heading);
  return { ...state, x: forward.x, y: forward.y };
};

export const applyRotateLeft = (state: RoverState): RoverState => ({
  ...state,
  heading: turnLeft(state.heading),
});

export const applyRotateRight = (state: RoverState): RoverState => ({
  ...state,
  heading: turnRight(state.heading),
});

/**
 * Applies a single action. A forward move that would leave the grid keeps the
 * pre-move position and heading and only flips `lost`.
 *
 * A lost rover is returned as-is; `run` stops before reaching this point.
 */
export const step = (
  grid: GridBounds,
  state: RoverState,
  action: RoverAction,
): RoverState => {
  if (state.lost) {
    return state;
  }

  switch (action) {
    case 'L':
      return applyRotateLeft(state);
    case 'R':
      return applyRotateRight(state);
    case 'F': {
      const candidate = applyForward(state);
      if (!isInsideGrid(grid, candidate.x, candidate.y)) {
        return { ...state, lost: true };
      }
      return { ...candidate, lost: false };
    }
    default: {
      const _exhaustive: never = action;
      return _exhaustive;
    }
  }
};
