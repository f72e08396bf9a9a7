import type { IHaveDebugStr } from '../utils/debug.js';

export interface ConstTable<D> extends IHaveDebugStr {
  numRows: number;
  numCols: number;
  getCell(row: number, col: number): D;
}

/**
 * A fixed width table of cells, used for rendering transition tables.
 */
export class Table<D> implements ConstTable<D> {
  private rows: D[][] = [];
  readonly numCols: number;

  constructor(numCols: number) {
    this.numCols = numCols;
  }

  get numRows() {
    return this.rows.length;
  }

  /**
   * Add a row to the bottom of the table.
   */
  addRow(cells: D[]) {
    if (cells.length != this.numCols) {
      throw new Error(
        `TableIndexError: row has ${cells.length} cells. Must have ${this.numCols}`
      );
    }
    this.rows.push([...cells]);
  }

  getCell(row: number, col: number): D {
    if (row < 0 || row >= this.rows.length) {
      throw new Error(
        `TableIndexError: Invalid row ${row}. Must be between 0 and ${this.rows.length} exclusive`
      );
    }
    if (col < 0 || col >= this.numCols) {
      throw new Error(
        `TableIndexError: Invalid col ${col}. Must be between 0 and ${this.numCols} exclusive`
      );
    }
    return this.rows[row][col];
  }

  /**
   * Render the table with every column right aligned to its widest cell,
   * plus two spaces of padding.
   */
  toDebugStr(format: (cell: D) => string = (cell) => `${cell}`) {
    const cells = this.rows.map((row) => row.map(format));
    const widths: number[] = [];
    for (let col = 0; col < this.numCols; col++) {
      let width = 1;
      for (const row of cells) {
        width = Math.max(width, row[col].length);
      }
      widths.push(width);
    }
    let out = '';
    for (const row of cells) {
      out += row.map((cell, col) => cell.padStart(widths[col] + 2)).join('');
      out += '\n';
    }
    return out;
  }
}
