import { MatrixError, ShapeError, fromRectangular } from '@gridmat/core';

function main() {
  // Ragged rows are rejected at construction
  try {
    fromRectangular([[1, 2, 3], [4, 5]]);
  } catch (error) {
    if (error instanceof ShapeError) {
      console.log(error.getFormattedMessage());
    }
  }

  // Zipping never truncates
  const a = fromRectangular([[1, 2]]);
  const b = fromRectangular([[1], [2]]);
  try {
    a.zipWith(b, (x, y) => x + y);
  } catch (error) {
    if (error instanceof MatrixError) {
      console.log(error.code, error.message); // SHAPE_MISMATCH Shape mismatch: [1, 2] vs [2, 1]
    }
  }

  // Diagonals need a square matrix
  try {
    a.getLU2RD();
  } catch (error) {
    if (error instanceof MatrixError) {
      console.log(error.category, error.message);
    }
  }
}

main();
