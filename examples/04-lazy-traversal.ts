import { fromRectangular } from '@gridmat/core';

function main() {
  const m = fromRectangular([
    [1, 2, 3],
    [4, 5, 6],
    [7, 8, 9],
  ]);

  // Column-major, skipping straight into the second column
  const byColumn = m.streamV().skip(3);
  console.log(byColumn.remainingCount()); // 6
  console.log(byColumn.nextValue()); // 2

  console.log(m.streamLU2RD().toArray()); // [1, 5, 9]
  console.log(m.streamRU2LD().toArray()); // [3, 5, 7]

  // Sequences read the live storage
  const row = m.streamH(1);
  m.set(1, 0, 40);
  console.log(row.toArray()); // [40, 5, 6]

  for (const p of m.pointsRU2LD()) {
    console.log(p.toString());
  }

  const table = m.toRowOrientedTable(['a', 'b', 'c']);
  console.log(table.row(0)); // { a: 1, b: 2, c: 3 }
}

main();
