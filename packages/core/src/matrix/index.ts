export { Matrix } from './matrix';
export type { CellAction, CellFunction, CellPredicate, Grid } from './matrix';
export type { DiagonalKind, FillValue, GridSource, MatrixOptions, Neighbor } from './types';
export {
  fromRectangular,
  repeatSingleRow,
  full,
  zeros,
  diagonalFrom,
  diagonalLU2RD,
  diagonalRU2LD,
} from './creation';
export { zip, zip3, zipAll, zipAllWith, isSameShape } from './combine';
export { Table } from './table';
export type { TableRow } from './table';
