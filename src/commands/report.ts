import type { GridBounds } from '../engine/grid';
import type { RoverState } from '../engine/rover';
import { run } from '../engine/sim';
import { decodeCommands, type DecodeResult } from './decode';

export const formatReport = (state: RoverState): string =>
  `(${state.x}, ${state.y}, ${state.heading})${state.lost ? ' LOST' : ''}`;

export const runWithReport = (
  grid: GridBounds,
  initialState: RoverState,
  commands: string,
): DecodeResult<string> => {
  const decoded = decodeCommands(commands);
  if (!decoded.ok) {
    return decoded;
  }

  return { ok: true, value: formatReport(run(grid, initialState, decoded.value)) };
};
