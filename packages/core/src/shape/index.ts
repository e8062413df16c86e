export { MatrixShape, MAX_MATRIX_SIZE, formatShape } from './runtime';
export { Position } from './position';
