/**
 * Cell coordinates
 */

export class Position {
  readonly row: number;
  readonly col: number;

  private constructor(row: number, col: number) {
    this.row = row;
    this.col = col;
  }

  static of(row: number, col: number): Position {
    return new Position(row, col);
  }

  equals(other: Position | null | undefined): boolean {
    return other != null && other.row === this.row && other.col === this.col;
  }

  toString(): string {
    return `(${this.row.toString()}, ${this.col.toString()})`;
  }
}
