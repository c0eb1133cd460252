/* Copyright (c) 2021-25 MIT 6.102/6.031 course staff, all rights reserved.
 * Redistribution of original or derived work requires permission of course staff.
 */

import { Board } from './board.js';
import { SolverConfig } from './config.js';
import { formatSolution, indent, solutionSteps } from './solution.js';
import { SolverOptions, solve } from './solver.js';

/** Outcome of solving one board, ready to print. */
export interface SolveReport {
    readonly solved: boolean;
    /** number of moves in the solution, 0 when unsolved */
    readonly moves: number;
    readonly explored: number;
    /** formatted solution, or the message for an unsolvable board */
    readonly text: string;
}

export const UNSOLVABLE_MESSAGE = 'Cannot find solution!';

/**
 * Solve a board and describe the outcome.
 *
 * @param board board to solve
 * @param config goal car, progress interval and tracing
 * @param log if given, receives progress lines and, when config.trace is
 *            set, the search trace
 * @returns the outcome as text
 * @throws Error if the goal car is not on the board
 */
export function solveBoard(board: Board, config: SolverConfig, log?: (line: string) => void): SolveReport {
    const options: SolverOptions = {
        goalCar: config.goalCar,
        progressInterval: config.progressInterval,
        onProgress: log ? progressReporter(log) : undefined,
        trace: config.trace ? log : undefined,
    };
    const result = solve(board, options);
    if (result.outcome === 'exhausted') {
        return { solved: false, moves: 0, explored: result.explored, text: UNSOLVABLE_MESSAGE + '\n' };
    }
    const moves = result.path.length - 1;
    const text = formatSolution(solutionSteps(result.path))
        + `Solved in ${moves} ${moves === 1 ? 'move' : 'moves'} (${result.explored} states explored)\n`;
    return { solved: true, moves, explored: result.explored, text };
}

function progressReporter(log: (line: string) => void): (explored: number) => void {
    return explored => log(`...explored ${explored} board states`);
}

/**
 * @returns the board drawn for display, with a heading
 */
export function describeInitial(board: Board): string {
    return `Initial board state:\n${indent(board.render())}\n`;
}
