import { describe, expect, it } from 'vitest';

import { createGrid } from '../grid';
import { createRoverState, type RoverAction } from '../rover';
import { run, runWithTrace } from '../sim';

describe('run()', () => {
  it('returns the initial state for an empty action list', () => {
    const start = createRoverState(0, 0, 'E');

    expect(run(createGrid(0, 0), start, [])).toBe(start);
  });

  it('turns left in place', () => {
    expect(run(createGrid(0, 0), createRoverState(0, 0, 'E'), ['L'])).toEqual(
      createRoverState(0, 0, 'N'),
    );
  });

  it('turns right in place', () => {
    expect(run(createGrid(0, 0), createRoverState(0, 0, 'E'), ['R'])).toEqual(
      createRoverState(0, 0, 'S'),
    );
  });

  it('moves forward inside the grid', () => {
    expect(run(createGrid(1, 0), createRoverState(0, 0, 'E'), ['F'])).toEqual(
      createRoverState(1, 0, 'E'),
    );
  });

  it('marks the rover lost when the first move leaves the grid', () => {
    expect(run(createGrid(0, 0), createRoverState(0, 0, 'E'), ['F'])).toEqual(
      createRoverState(0, 0, 'E', true),
    );
  });

  it('ignores every action after the rover is lost', () => {
    const actions: RoverAction[] = ['F', 'F', 'L', 'L', 'F', 'F'];

    expect(run(createGrid(1, 0), createRoverState(0, 0, 'E'), actions)).toEqual(
      createRoverState(1, 0, 'E', true),
    );
  });

  it('returns a rover that starts lost without applying anything', () => {
    const start = createRoverState(3, 3, 'W', true);

    expect(run(createGrid(5, 5), start, ['L', 'F', 'R'])).toBe(start);
  });

  it('handles long action lists without growing the stack', () => {
    const actions: RoverAction[] = Array.from({ length: 200_000 }, (_, index) =>
      index % 2 === 0 ? 'F' : 'R',
    );
    // F,R pairs walk a 1x1 square: (0,0,N) -> (0,1,E) -> (1,1,S) -> (1,0,W) -> (0,0,N)
    const final = run(createGrid(1, 1), createRoverState(0, 0, 'N'), actions);

    expect(final).toEqual(createRoverState(0, 0, 'N'));
  });
});

describe('runWithTrace()', () => {
  it('records every intermediate state', () => {
    const trace = runWithTrace(createGrid(2, 2), createRoverState(0, 0, 'N'), ['F', 'R', 'F']);

    expect(trace.states).toEqual([
      createRoverState(0, 0, 'N'),
      createRoverState(0, 1, 'N'),
      createRoverState(0, 1, 'E'),
      createRoverState(1, 1, 'E'),
    ]);
    expect(trace.final).toEqual(createRoverState(1, 1, 'E'));
    expect(trace.appliedCount).toBe(3);
    expect(trace.ignoredCount).toBe(0);
  });

  it('counts the actions skipped after the rover is lost', () => {
    const grid = createGrid(1, 0);
    const start = createRoverState(0, 0, 'E');
    const actions: RoverAction[] = ['F', 'F', 'L', 'L', 'F', 'F'];
    const trace = runWithTrace(grid, start, actions);

    expect(trace.appliedCount).toBe(2);
    expect(trace.ignoredCount).toBe(4);
    expect(trace.states).toHaveLength(3);
    expect(trace.final).toEqual(run(grid, start, actions));
  });
});
