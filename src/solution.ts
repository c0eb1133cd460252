/* Copyright (c) 2021-25 MIT 6.102/6.031 course staff, all rights reserved.
 * Redistribution of original or derived work requires permission of course staff.
 */

import assert from 'node:assert';
import { Board } from './board.js';
import { Move, describeMove } from './moves.js';
import { FrontierEntry, ROOT, SearchState } from './search.js';

/** One numbered board of a solution and the move that leaves it. */
export interface SolutionStep {
    readonly step: number;
    readonly board: Board;
    /** board after `move`, undefined on the last step */
    readonly next: Board | undefined;
    readonly move: Move | undefined;
}

/**
 * Walk origin pointers from the entry at `index` back to the root.
 *
 * @param state a search state
 * @param index requires 0 <= index < state.size
 * @returns the entries from the root to the entry at index, in that order
 */
export function reconstructPath(state: SearchState, index: number): Array<FrontierEntry> {
    assert(Number.isInteger(index) && index >= 0 && index < state.size, `index ${index} is not in the frontier`);
    const chain: Array<FrontierEntry> = [];
    for (let i = index; i !== ROOT;) {
        const entry = state.entry(i);
        chain.push(entry);
        assert(entry.origin < i, `entry ${i} points forward to ${entry.origin}`);
        i = entry.origin;
    }
    return chain.reverse();
}

/**
 * Number the boards of a path from 1 and pair each with its successor.
 *
 * @param path entries from the root to the goal, as returned by reconstructPath
 */
export function solutionSteps(path: ReadonlyArray<FrontierEntry>): Array<SolutionStep> {
    return path.map((entry, i) => {
        const following = path[i + 1];
        return {
            step: i + 1,
            board: entry.board,
            next: following?.board,
            move: following?.move,
        };
    });
}

/**
 * @param steps solution steps
 * @param prefix indentation for every board line
 * @returns printable solution: per step a header, the indented drawing with
 *          the move's arrow, and a blank line
 */
export function formatSolution(steps: ReadonlyArray<SolutionStep>, prefix = '  '): string {
    const lines: Array<string> = [];
    for (const { step, board, next, move } of steps) {
        lines.push(move ? `Solution step ${step}: ${describeMove(move)}` : `Solution step ${step}`);
        lines.push(indent(board.render(next), prefix), '');
    }
    return lines.join('\n') + '\n';
}

/**
 * @returns text with prefix added to the start of every line
 */
export function indent(text: string, prefix = '  '): string {
    return text.split('\n').map(line => prefix + line).join('\n');
}
