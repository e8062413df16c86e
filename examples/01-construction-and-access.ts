import { Position, diagonalFrom, fromRectangular, full, nullable, stringType, zeros } from '@gridmat/core';

function main() {
  // 2 x 3 grid of numbers; the element type is inferred
  const m = fromRectangular([
    [1, 2, 3],
    [4, 5, 6],
  ]);
  console.log(m.toString()); // Matrix(shape=[2, 3], elementType=number)

  m.set(0, 2, 30);
  console.log(m.get(0, 2)); // 30
  console.log(m.getAt(Position.of(1, 1))); // 5

  // Neighbors report absence instead of throwing at the border
  const up = m.upOf(0, 0);
  console.log(up.present ? up.value : 'none'); // none
  const right = m.rightOf(0, 0);
  console.log(right.present ? right.value : 'none'); // 2

  // Strings, booleans and bigints are inferred; other types are named
  const labels = full(2, 2, 'x');
  const cells = full(1, 2, null, { elementType: nullable(stringType) });
  console.log(cells.toArray()); // [[null, null]]
  labels.updateAll((_, i, j) => `${i.toString()}${j.toString()}`);
  console.log(labels.toArray()); // [['00', '01'], ['10', '11']]

  // The main diagonal wins the centre cell
  const cross = diagonalFrom([1, 1, 1], [2, 2, 2]);
  console.log(cross.toArray()); // [[1, 0, 2], [0, 1, 0], [2, 0, 1]]

  console.log(zeros(2, 3).isEmpty()); // false
}

main();
