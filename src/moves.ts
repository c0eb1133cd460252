/* Copyright (c) 2021-25 MIT 6.102/6.031 course staff, all rights reserved.
 * Redistribution of original or derived work requires permission of course staff.
 */

import { Board, Direction, EMPTY } from './board.js';

/**
 * - slide: a car moved one cell
 * - vacate: a car other than the goal car drove off through the exit
 * - escape: the goal car reached the exit; the puzzle is solved
 */
export type MoveKind = 'slide' | 'vacate' | 'escape';

/** One move: `car` travelled `direction` into the formerly empty cell (row, column). */
export interface Move {
    readonly car: string;
    readonly direction: Direction;
    readonly row: number;
    readonly column: number;
    readonly kind: MoveKind;
}

/**
 * Offsets to scan from an empty cell to find a car that can move into it;
 * the car then travels opposite to the scan.
 */
export interface Scan {
    readonly direction: Direction;
    readonly dRow: number;
    readonly dColumn: number;
}

export const SCANS: ReadonlyArray<Scan> = [
    { direction: 'left', dRow: 0, dColumn: +1 },
    { direction: 'right', dRow: 0, dColumn: -1 },
    { direction: 'up', dRow: +1, dColumn: 0 },
    { direction: 'down', dRow: -1, dColumn: 0 },
];

/**
 * Receives each successor board. The board is a scratch board that is
 * changed again as soon as the visitor returns, so keep a copy if needed.
 *
 * @returns true to stop generating successors
 */
export type SuccessorVisitor = (successor: Board, move: Move) => boolean;

/**
 * @returns a short human-readable description of move
 */
export function describeMove(move: Move): string {
    switch (move.kind) {
        case 'slide': return `${move.car} ${move.direction}`;
        case 'vacate': return `${move.car} leaves the board`;
        case 'escape': return `${move.car} escapes`;
    }
}

/**
 * Offer every board reachable from `board` in one move to `visit`, scanning
 * empty cells in row-major order and, for each, the directions in SCANS order.
 *
 * @param board board to move from; not modified
 * @param goalCar identifier of the car whose exit solves the puzzle
 * @param visit receives each successor
 * @returns true iff visit asked to stop
 */
export function forEachSuccessor(board: Board, goalCar: string, visit: SuccessorVisitor): boolean {
    const scratch = board.copy();
    for (let row = 0; row < scratch.size; ++row) {
        for (let column = 0; column < scratch.size; ++column) {
            if (scratch.cellAt(row, column) !== EMPTY) continue;
            for (const scan of SCANS) {
                if (probeMove(scratch, row, column, scan, goalCar, visit)) {
                    return true;
                }
            }
        }
    }
    return false;
}

/**
 * Look for a car that can move into the empty cell (row, column) against
 * the scan direction, and offer the resulting board(s) to visit.
 *
 * Mutates scratch while visit runs and restores it before returning, on
 * every path.
 *
 * @returns true iff visit asked to stop
 */
export function probeMove(
    scratch: Board, row: number, column: number, scan: Scan, goalCar: string, visit: SuccessorVisitor
): boolean {
    const { dRow, dColumn, direction } = scan;
    let r = row + 2 * dRow;
    let c = column + 2 * dColumn;
    if (!scratch.inBounds(r, c)) return false;

    const car = scratch.cellAt(r, c);
    if (car === EMPTY || scratch.cellAt(r - dRow, c - dColumn) !== car) return false;

    // walk to the far end of the car; the walk does not assume a car length
    while (scratch.inBounds(r + dRow, c + dColumn) && scratch.cellAt(r + dRow, c + dColumn) === car) {
        r += dRow;
        c += dColumn;
    }

    // moving one cell only touches the cell entered and the far end left behind
    scratch.setCell(row, column, car);
    scratch.setCell(r, c, EMPTY);
    try {
        const move = { car, direction, row, column };
        const atExit = direction === 'right' && row === scratch.exitRow && column === scratch.size - 1;
        if (!atExit) {
            return visit(scratch, { ...move, kind: 'slide' });
        }
        if (car === goalCar) {
            return visit(scratch, { ...move, kind: 'escape' });
        }
        if (visit(scratch, { ...move, kind: 'slide' })) {
            return true;
        }
        return vacate(scratch, row, c + 1, column, car, () => visit(scratch, { ...move, kind: 'vacate' }));
    } finally {
        scratch.setCell(row, column, EMPTY);
        scratch.setCell(r, c, car);
    }
}

// clear columns from..to of row while body runs, then park the car there again
function vacate(scratch: Board, row: number, from: number, to: number, car: string, body: () => boolean): boolean {
    for (let c = from; c <= to; ++c) {
        scratch.setCell(row, c, EMPTY);
    }
    try {
        return body();
    } finally {
        for (let c = from; c <= to; ++c) {
            scratch.setCell(row, c, car);
        }
    }
}
