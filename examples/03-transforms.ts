import { configure, fromRectangular, zipAll } from '@gridmat/core';

function main() {
  const m = fromRectangular([
    [1, 2, 3],
    [4, 5, 6],
  ]);

  console.log(m.transpose().toArray()); // [[1, 4], [2, 5], [3, 6]]
  console.log(m.rotate90().toArray()); // [[4, 1], [5, 2], [6, 3]]
  console.log(m.flipH().toArray()); // [[3, 2, 1], [6, 5, 4]]

  // Row-major refill; the tail keeps the zero value
  console.log(m.reshape(2, 4).toArray()); // [[1, 2, 3, 4], [5, 6, 0, 0]]

  // Margins: one row above, one column on each side, filled with -1
  console.log(m.extend(1, 0, 1, 1, -1).toArray());

  console.log(m.repelem(1, 2).toArray()); // [[1, 1, 2, 2, 3, 3], [4, 4, 5, 5, 6, 6]]
  console.log(m.repmat(2, 1).toArray()); // [[1, 2, 3], [4, 5, 6], [1, 2, 3], [4, 5, 6]]

  // Bulk operations split into bands when partitioning is on
  configure({ parallelMode: 'yes', maxPartitions: 2 });
  const total = zipAll([m, m, m], (acc, v) => acc + v);
  console.log(total.toArray()); // [[3, 6, 9], [12, 15, 18]]
}

main();
