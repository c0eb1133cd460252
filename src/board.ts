/* Copyright (c) 2021-25 MIT 6.102/6.031 course staff, all rights reserved.
 * Redistribution of original or derived work requires permission of course staff.
 */

import assert from 'node:assert';
import fs from 'node:fs';

/** Cell value for a square no car occupies. */
export const EMPTY = '.';

/** Trailing marker on the exit row in board text. */
export const EXIT_MARKER = '>';

export type Orientation = 'horizontal' | 'vertical';

/** The direction a car travels in a single move. */
export type Direction = 'left' | 'right' | 'up' | 'down';

/** Glyph drawn in the cell a car moved into, pointing the way it moved. */
export const ARROWS: Readonly<Record<Direction, string>> = {
    left: '<',
    right: '>',
    up: '^',
    down: 'v',
};

/**
 * The cells one car occupies: a straight run starting at (row, column) and
 * extending right (horizontal) or down (vertical).
 */
export interface CarSpan {
    readonly id: string;
    readonly row: number;
    readonly column: number;
    readonly length: number;
    readonly orientation: Orientation;
}

const CAR_ID = /^[A-Za-z0-9]$/;

/**
 * Rush Hour board ADT.
 *
 * A square grid of cells, each either EMPTY or holding the one-character
 * identifier of the car parked on it, plus the row whose right edge is the
 * exit. Boards are compared by their cells only; the exit row is a property
 * of the puzzle and is shared by every board of one search.
 *
 * Boards are mutable through `setCell` so the move generator can reuse one
 * scratch board, but every board stored by the search is a private copy that
 * nothing writes to again.
 */
export class Board {

    // side length of the grid
    public readonly size: number;

    // row whose right edge is the exit
    public readonly exitRow: number;

    // cells[row * size + column] is the cell at (row, column)
    private readonly cells: Array<string>;

    // Abstraction function:
    //   AF(size, exitRow, cells) = the size x size parking lot where the square
    //     at (r,c) is empty if cells[r*size+c] === EMPTY and otherwise holds
    //     part of the car named cells[r*size+c]; cars leave through the right
    //     edge of row exitRow.
    //
    // Representation invariant:
    //   - size is an integer >= 2
    //   - 0 <= exitRow < size
    //   - cells.length === size * size
    //   - every cell is EMPTY or a single letter or digit
    //
    // Safety from rep exposure:
    //   - cells is private and copied on the way in; observers return strings
    //     or freshly built objects, never the array itself.

    /**
     * Make a board.
     *
     * @param size side length of the grid, an integer >= 2
     * @param exitRow row whose right edge is the exit, 0 <= exitRow < size
     * @param cells size*size cell values in row-major order
     */
    public constructor(size: number, exitRow: number, cells: ReadonlyArray<string>) {
        this.size = size;
        this.exitRow = exitRow;
        this.cells = [...cells];
        this.checkRep();
    }

    private checkRep(): void {
        assert(Number.isInteger(this.size) && this.size >= 2, `invalid board size ${this.size}`);
        assert(Number.isInteger(this.exitRow) && this.exitRow >= 0 && this.exitRow < this.size,
            `exit row ${this.exitRow} is off the board`);
        assert.strictEqual(this.cells.length, this.size * this.size);
        for (const cell of this.cells) {
            assert(cell === EMPTY || CAR_ID.test(cell), `invalid cell value '${cell}'`);
        }
    }

    /**
     * @returns true iff (row, column) is on the board
     */
    public inBounds(row: number, column: number): boolean {
        return row >= 0 && row < this.size && column >= 0 && column < this.size;
    }

    /**
     * @param row requires 0 <= row < size
     * @param column requires 0 <= column < size
     * @returns the cell at (row, column)
     */
    public cellAt(row: number, column: number): string {
        assert(this.inBounds(row, column), `cell (${row},${column}) is off the board`);
        const cell = this.cells[row * this.size + column];
        assert(cell !== undefined);
        return cell;
    }

    /**
     * @returns the cell at (row, column), or EMPTY when it is off the board
     */
    public cellAtOrDefault(row: number, column: number): string {
        return this.inBounds(row, column) ? this.cellAt(row, column) : EMPTY;
    }

    /**
     * Overwrite one cell.
     *
     * @param row requires 0 <= row < size
     * @param column requires 0 <= column < size
     * @param value EMPTY or a car identifier
     */
    public setCell(row: number, column: number, value: string): void {
        assert(this.inBounds(row, column), `cell (${row},${column}) is off the board`);
        this.cells[row * this.size + column] = value;
    }

    /**
     * @returns a string that is equal for two boards iff their cells are equal
     */
    public key(): string {
        return this.cells.join('');
    }

    /**
     * @returns true iff that board has the same size and the same cells
     */
    public equals(that: Board): boolean {
        return this.size === that.size && this.key() === that.key();
    }

    /**
     * @returns a new board with the same cells and exit row, sharing nothing with this one
     */
    public copy(): Board {
        return new Board(this.size, this.exitRow, this.cells);
    }

    /**
     * Locate every car on the board.
     *
     * @returns map from car identifier to the span it occupies, in the order
     *          the cars are first met scanning rows top to bottom
     * @throws Error if some car's cells are not a straight contiguous run of
     *         at least two cells
     */
    public cars(): Map<string, CarSpan> {
        const cellsOf = new Map<string, Array<{ row: number; column: number }>>();
        for (let row = 0; row < this.size; ++row) {
            for (let column = 0; column < this.size; ++column) {
                const cell = this.cellAt(row, column);
                if (cell === EMPTY) continue;
                const found = cellsOf.get(cell) ?? [];
                found.push({ row, column });
                cellsOf.set(cell, found);
            }
        }

        const spans = new Map<string, CarSpan>();
        for (const [id, found] of cellsOf) {
            const [first] = found;
            assert(first !== undefined);
            if (found.length < 2) {
                throw new Error(`car ${id} occupies a single cell`);
            }
            // cells arrive in row-major order, so a valid car lists them left to right or top to bottom
            const horizontal = found.every((p, i) => p.row === first.row && p.column === first.column + i);
            const vertical = found.every((p, i) => p.column === first.column && p.row === first.row + i);
            if (!horizontal && !vertical) {
                throw new Error(`car ${id} is not a straight contiguous run`);
            }
            spans.set(id, {
                id,
                row: first.row,
                column: first.column,
                length: found.length,
                orientation: horizontal ? 'horizontal' : 'vertical',
            });
        }
        return spans;
    }

    /**
     * Draw this board, one line per row.
     *
     * If `next` differs from this board by one move, the cell the car moved
     * into shows the arrow for that move. A car on the exit row that is gone
     * from `next`, with nothing in `next` between it and the right edge, is
     * drawn followed by `>` glyphs running one column past the edge.
     *
     * @param next successor board of the same size, or this board for a plain drawing
     * @returns the drawing, rows separated by newlines, without a trailing newline
     */
    public render(next: Board = this): string {
        assert.strictEqual(next.size, this.size, 'boards differ in size');
        const lines: Array<string> = [];
        for (let row = 0; row < this.size; ++row) {
            let line = '';
            for (let column = 0; column < this.size; ++column) {
                const cell = this.cellAt(row, column);
                const after = next.cellAt(row, column);
                if (cell === after) {
                    line += cell;
                } else if (cell === EMPTY) {
                    line += this.arrowInto(row, column, after);
                } else if (after === EMPTY && this.departs(next, row, column)) {
                    line += this.departure(row, column);
                    break;
                } else {
                    line += cell;
                }
            }
            lines.push(line);
        }
        return lines.join('\n');
    }

    // arrow for car moving into the empty cell (row, column)
    private arrowInto(row: number, column: number, car: string): string {
        if (this.cellAtOrDefault(row, column - 1) === car) return ARROWS.right;
        if (this.cellAtOrDefault(row, column + 1) === car) return ARROWS.left;
        if (this.cellAtOrDefault(row - 1, column) === car) return ARROWS.down;
        if (this.cellAtOrDefault(row + 1, column) === car) return ARROWS.up;
        throw new assert.AssertionError({ message: `car ${car} cannot reach (${row},${column}) in one move` });
    }

    // true iff the car at (row, column) is gone from next and nothing in next stands between it and the exit
    private departs(next: Board, row: number, column: number): boolean {
        if (row !== this.exitRow || column >= this.size - 1) return false;
        const car = this.cellAt(row, column);
        if (next.key().includes(car)) return false;
        for (let c = column + 1; c < this.size; ++c) {
            const here = this.cellAt(row, c);
            if (next.cellAt(row, c) !== EMPTY || (here !== EMPTY && here !== car)) {
                return false;
            }
        }
        return true;
    }

    // remaining cells of the departing car, then arrows through one column past the edge
    private departure(row: number, column: number): string {
        const car = this.cellAt(row, column);
        let text = '';
        let c = column;
        for (; c < this.size && this.cellAt(row, c) === car; ++c) {
            text += car;
        }
        return text + ARROWS.right.repeat(this.size + 1 - c);
    }

    /**
     * @returns this board in the text format read by `Board.parse`
     */
    public toString(): string {
        const lines = [`${this.size}x${this.size}`];
        for (let row = 0; row < this.size; ++row) {
            const cells = this.cells.slice(row * this.size, (row + 1) * this.size).join('');
            lines.push(row === this.exitRow ? cells + EXIT_MARKER : cells);
        }
        return lines.join('\n') + '\n';
    }

    /**
     * Parse a board from text.
     *
     * The first non-blank line is `NxN`; then come N rows of N cells, each
     * EMPTY or a letter or digit, and exactly one of them followed by
     * EXIT_MARKER. Blank lines and surrounding whitespace are ignored.
     *
     * @param text board text
     * @returns the board described by text
     * @throws Error if text is not a valid board
     */
    public static parse(text: string): Board {
        const lines = text.split(/\r?\n/).map(line => line.trim()).filter(line => line.length > 0);
        const [header, ...rows] = lines;
        if (header === undefined) {
            throw new Error('empty board file');
        }
        const match = header.match(/^(\d+)x(\d+)$/);
        if (!match || match[1] === undefined || match[2] === undefined) {
            throw new Error(`invalid board header '${header}'`);
        }
        const size = parseInt(match[1], 10);
        if (size !== parseInt(match[2], 10)) {
            throw new Error(`board must be square, got ${header}`);
        }
        if (size < 2) {
            throw new Error(`board is too small: ${header}`);
        }
        if (rows.length !== size) {
            throw new Error(`expected ${size} rows, got ${rows.length}`);
        }

        const cells: Array<string> = [];
        const exitRows: Array<number> = [];
        rows.forEach((line, row) => {
            let body = line;
            if (line.length === size + 1 && line.endsWith(EXIT_MARKER)) {
                exitRows.push(row);
                body = line.slice(0, size);
            }
            if (body.length !== size) {
                throw new Error(`row ${row} has ${body.length} cells, expected ${size}`);
            }
            for (const cell of body) {
                if (cell !== EMPTY && !CAR_ID.test(cell)) {
                    throw new Error(`invalid cell '${cell}' in row ${row}`);
                }
                cells.push(cell);
            }
        });

        const [exitRow] = exitRows;
        if (exitRow === undefined) {
            throw new Error(`no exit row marked with '${EXIT_MARKER}'`);
        }
        if (exitRows.length > 1) {
            throw new Error(`more than one exit row marked: rows ${exitRows.join(', ')}`);
        }

        const board = new Board(size, exitRow, cells);
        board.cars();
        return board;
    }

    /**
     * Make a new board by parsing a file.
     *
     * @param filename path to a board file
     * @returns the board in the file
     * @throws Error if the file cannot be read or is not a valid board
     */
    public static async parseFromFile(filename: string): Promise<Board> {
        const text = (await fs.promises.readFile(filename)).toString();
        return Board.parse(text);
    }
}
