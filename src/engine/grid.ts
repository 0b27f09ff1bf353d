export interface GridBounds {
  readonly edgeX: number;
  readonly edgeY: number;
}

export const createGrid = (edgeX: number, edgeY: number): GridBounds => ({
  edgeX,
  edgeY,
});

export const isOutOfBounds = (coordinate: number, edge: number): boolean =>
  coordinate < 0 || coordinate > edge;

export const isInsideGrid = (grid: GridBounds, x: number, y: number): boolean =>
  !isOutOfBounds(x, grid.edgeX) && !isOutOfBounds(y, grid.edgeY);
