/**
 * Two-layer square board.
 *
 * Cells are packed into a single Uint8Array, two slots per cell
 * (primary then secondary), so cloning is one typed-array copy and no
 * clone ever shares storage with its source.
 */
import { BoardRangeError, InvalidRecordError } from './errors';
import { Cell, CellValue, Edge, Layer, Player, StoneCount } from './types';

const EMPTY = 0;
const CODE_A = 1;
const CODE_B = 2;

const NEIGHBOUR_STEPS: readonly (readonly [number, number])[] = [
  [1, 0],
  [-1, 0],
  [0, 1],
  [0, -1],
];

function encode(value: CellValue): number {
  if (value === 'A') return CODE_A;
  if (value === 'B') return CODE_B;
  return EMPTY;
}

function decode(code: number): CellValue {
  if (code === CODE_A) return 'A';
  if (code === CODE_B) return 'B';
  return null;
}

function layerOffset(layer: Layer): number {
  return layer === 'primary' ? 0 : 1;
}

export class Board {
  readonly size: number;
  private cells: Uint8Array;

  constructor(size: number, cells?: Uint8Array) {
    this.size = size;
    this.cells = cells ?? new Uint8Array(size * size * 2);
  }

  isInside(row: number, col: number): boolean {
    return Number.isInteger(row) && Number.isInteger(col) &&
      row >= 0 && row < this.size && col >= 0 && col < this.size;
  }

  get(row: number, col: number): Cell {
    const base = this.index(row, col);
    return {
      primary: decode(this.cells[base]),
      secondary: decode(this.cells[base + 1]),
    };
  }

  getLayer(row: number, col: number, layer: Layer): CellValue {
    return decode(this.cells[this.index(row, col) + layerOffset(layer)]);
  }

  set(row: number, col: number, layer: Layer, value: CellValue): void {
    this.cells[this.index(row, col) + layerOffset(layer)] = encode(value);
  }

  /** A cell belongs to a player if either layer holds that player. */
  belongsTo(row: number, col: number, player: Player): boolean {
    const base = this.index(row, col);
    const code = encode(player);
    return this.cells[base] === code || this.cells[base + 1] === code;
  }

  clone(): Board {
    return new Board(this.size, this.cells.slice());
  }

  equals(other: Board): boolean {
    if (other.size !== this.size) return false;
    for (let i = 0; i < this.cells.length; i++) {
      if (this.cells[i] !== other.cells[i]) return false;
    }
    return true;
  }

  /**
   * Flood fill from the player's starting edge.
   * A: row 0 to row N-1. B: column 0 to column N-1.
   */
  hasConnection(player: Player): boolean {
    const n = this.size;
    const code = encode(player);
    const visited = new Uint8Array(n * n);
    const stack: number[] = [];

    for (let i = 0; i < n; i++) {
      const row = player === 'A' ? 0 : i;
      const col = player === 'A' ? i : 0;
      const base = (row * n + col) * 2;
      if (this.cells[base] === code || this.cells[base + 1] === code) {
        visited[row * n + col] = 1;
        stack.push(row * n + col);
      }
    }

    for (let idx = stack.pop(); idx !== undefined; idx = stack.pop()) {
      const row = Math.floor(idx / n);
      const col = idx % n;

      if (player === 'A' ? row === n - 1 : col === n - 1) {
        return true;
      }

      for (const [dr, dc] of NEIGHBOUR_STEPS) {
        const nr = row + dr;
        const nc = col + dc;
        if (nr < 0 || nr >= n || nc < 0 || nc >= n) continue;
        const nIdx = nr * n + nc;
        if (visited[nIdx]) continue;
        const base = nIdx * 2;
        if (this.cells[base] === code || this.cells[base + 1] === code) {
          visited[nIdx] = 1;
          stack.push(nIdx);
        }
      }
    }

    return false;
  }

  countStones(player: Player): StoneCount {
    const code = encode(player);
    let primary = 0;
    let secondary = 0;
    for (let i = 0; i < this.cells.length; i += 2) {
      if (this.cells[i] === code) primary++;
      if (this.cells[i + 1] === code) secondary++;
    }
    return { primary, secondary, total: primary + secondary };
  }

  /** Cells on the given edge that belong to the player. */
  edgeCells(player: Player, edge: Edge): [number, number][] {
    const last = this.size - 1;
    const result: [number, number][] = [];
    for (let i = 0; i < this.size; i++) {
      const horizontal = edge === 'top' || edge === 'bottom';
      const row = horizontal ? (edge === 'top' ? 0 : last) : i;
      const col = horizontal ? i : (edge === 'left' ? 0 : last);
      if (this.belongsTo(row, col, player)) {
        result.push([row, col]);
      }
    }
    return result;
  }

  toJSON(): Cell[][] {
    const grid: Cell[][] = [];
    for (let row = 0; row < this.size; row++) {
      const line: Cell[] = [];
      for (let col = 0; col < this.size; col++) {
        line.push(this.get(row, col));
      }
      grid.push(line);
    }
    return grid;
  }

  static fromJSON(grid: readonly (readonly Cell[])[]): Board {
    const board = new Board(grid.length);
    grid.forEach((line, row) => {
      if (line.length !== grid.length) {
        throw new InvalidRecordError(`Board row ${row} has length ${line.length}, expected ${grid.length}`, {
          row,
          length: line.length,
          expected: grid.length,
        });
      }
      line.forEach((cell, col) => {
        board.set(row, col, 'primary', cell.primary);
        board.set(row, col, 'secondary', cell.secondary);
      });
    });
    return board;
  }

  /**
   * Text diagram, one token per cell: primary then secondary,
   * '.' for an empty slot. "A." is a plain A stone, "AA" a bridged one.
   */
  render(): string {
    const lines: string[] = [];
    const colWidth = String(this.size - 1).length;
    const header = ' '.repeat(colWidth + 1) +
      Array.from({ length: this.size }, (_, c) => String(c).padStart(2, ' ')).join(' ');
    lines.push(header);

    for (let row = 0; row < this.size; row++) {
      const tokens: string[] = [];
      for (let col = 0; col < this.size; col++) {
        const { primary, secondary } = this.get(row, col);
        tokens.push(`${primary ?? '.'}${secondary ?? '.'}`);
      }
      lines.push(`${String(row).padStart(colWidth, ' ')} ${tokens.join(' ')}`);
    }
    return lines.join('\n');
  }

  private index(row: number, col: number): number {
    if (!this.isInside(row, col)) {
      throw new BoardRangeError(row, col, this.size);
    }
    return (row * this.size + col) * 2;
  }
}
