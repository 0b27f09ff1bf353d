export type Heading = 'N' | 'E' | 'S' | 'W';

export type RoverAction = 'F' | 'L' | 'R';

export interface RoverState {
  readonly x: number;
  readonly y: number;
  readonly heading: Heading;
  readonly lost: boolean;
}

export const HEADINGS: readonly Heading[] = ['N', 'E', 'S', 'W'];

export const createRoverState = (
  x: number,
  y: number,
  heading: Heading,
  lost = false,
): RoverState => ({
  x,
  y,
  heading,
  lost,
});

export const isHeading = (value: string): value is Heading =>
  HEADINGS.some((heading) => heading === value);
