/**
 * Represents a cell offset within a look up table.
 * x = 0 is the leftmost column, y = 0 is the bottom row.
 */
export class CellOffset {
  constructor(
    public readonly x: number,
    public readonly y: number
  ) {}

  /**
   * Create a string key for use in Sets or Maps.
   */
  toKey(): string {
    return `${this.x},${this.y}`;
  }

  /**
   * Check equality with another offset.
   */
  equals(other: CellOffset): boolean {
    return this.x === other.x && this.y === other.y;
  }

  toString(): string {
    return `CellOffset(${this.x}, ${this.y})`;
  }
}
