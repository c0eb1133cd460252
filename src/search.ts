/* Copyright (c) 2021-25 MIT 6.102/6.031 course staff, all rights reserved.
 * Redistribution of original or derived work requires permission of course staff.
 */

import assert from 'node:assert';
import { Board } from './board.js';
import { Move } from './moves.js';

/** Origin of the root entry, which was not reached from any other board. */
export const ROOT = -1;

/** A discovered board and how it was reached. */
export interface FrontierEntry {
    readonly board: Board;
    /** index of the entry this board was reached from, or ROOT */
    readonly origin: number;
    /** move from the origin's board to this board; undefined for the root */
    readonly move: Move | undefined;
}

/**
 * Mutable record of a breadth-first search: every board discovered so far,
 * in discovery order, plus the set of their keys.
 *
 * The frontier is append-only and also serves as the search queue: a cursor
 * over its indices is the dequeue pointer and `register` is the enqueue.
 */
export class SearchState {

    private readonly frontier: Array<FrontierEntry> = [];
    private readonly visited: Set<string> = new Set();

    // Abstraction function:
    //   AF(frontier, visited) = the boards discovered by a search, where
    //     frontier[i].board was the i-th discovered and was first reached by
    //     frontier[i].move from frontier[frontier[i].origin].board
    //
    // Representation invariant:
    //   - visited.size === frontier.length
    //   - visited contains exactly the keys of the frontier boards, so no two
    //     frontier boards are equal
    //   - frontier[0].origin === ROOT and frontier[0].move === undefined
    //   - for i > 0, 0 <= frontier[i].origin < i
    //
    // Safety from rep exposure:
    //   - boards are copied when registered and are never written afterwards;
    //     entries are readonly, so handing them out exposes nothing mutable.

    private checkRep(): void {
        assert.strictEqual(this.visited.size, this.frontier.length, 'visited set and frontier are out of step');
    }

    /** @returns number of boards discovered so far */
    public get size(): number {
        return this.frontier.length;
    }

    /**
     * Add a board to the search unless an equal board was already discovered.
     *
     * @param candidate board to add; copied, so the caller may keep changing it
     * @param origin index of the entry candidate was reached from, or ROOT for
     *        the first board of a search
     * @param move how candidate was reached from origin
     * @returns true iff candidate was new and has been appended
     */
    public register(candidate: Board, origin: number, move?: Move): boolean {
        if (origin === ROOT) {
            assert.strictEqual(this.frontier.length, 0, 'the root must be registered first');
        } else {
            assert(Number.isInteger(origin) && origin >= 0 && origin < this.frontier.length,
                `origin ${origin} is not in the frontier`);
        }

        const key = candidate.key();
        if (this.visited.has(key)) {
            return false;
        }
        this.visited.add(key);
        this.frontier.push({ board: candidate.copy(), origin, move });
        this.checkRep();
        return true;
    }

    /**
     * @param index requires 0 <= index < size
     * @returns the entry discovered index-th
     */
    public entry(index: number): FrontierEntry {
        const entry = this.frontier[index];
        assert(entry !== undefined, `index ${index} is not in the frontier`);
        return entry;
    }

    /**
     * Linear scan, for diagnostics only.
     *
     * @returns index of the entry whose board equals board, or -1
     */
    public indexOf(board: Board): number {
        return this.frontier.findIndex(entry => entry.board.equals(board));
    }
}
