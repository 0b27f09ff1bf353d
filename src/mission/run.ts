import { describeDecodeError, decodeCommands } from '../commands/decode';
import { formatReport } from '../commands/report';
import { createGrid } from '../engine/grid';
import { createRoverState } from '../engine/rover';
import { run } from '../engine/sim';
import { getLogger } from '../utils/logger';
import type { Mission, MissionReport, RoverPlan } from './types';

const roverId = (plan: RoverPlan, index: number): string => plan.id ?? `rover-${index + 1}`;

/**
 * Runs every rover of a mission against the shared grid. Rovers are
 * independent: a rover whose commands fail to decode is reported and skipped,
 * the rest still run.
 */
export const runMission = (mission: Mission): MissionReport[] => {
  const grid = createGrid(mission.grid.edgeX, mission.grid.edgeY);

  return mission.rovers.map((plan, index): MissionReport => {
    const id = roverId(plan, index);
    const decoded = decodeCommands(plan.commands);
    if (!decoded.ok) {
      getLogger().warn('Rover commands rejected', { rover: id, ...decoded.error });
      return { id, ok: false, error: describeDecodeError(decoded.error) };
    }

    const start = createRoverState(plan.start.x, plan.start.y, plan.start.heading);
    const final = run(grid, start, decoded.value);
    getLogger().debug('Rover run complete', {
      rover: id,
      actions: decoded.value.length,
      lost: final.lost,
    });

    return { id, ok: true, report: formatReport(final) };
  });
};
