/* Copyright (c) 2021-25 MIT 6.102/6.031 course staff, all rights reserved.
 * Redistribution of original or derived work requires permission of course staff.
 */

import assert from 'node:assert';
import { Board } from './board.js';
import { DEFAULT_CONFIG } from './config.js';
import { Move, forEachSuccessor } from './moves.js';
import { FrontierEntry, ROOT, SearchState } from './search.js';
import { indent, reconstructPath } from './solution.js';

export type SolverPhase = 'initializing' | 'exploring' | 'solved' | 'exhausted';

export interface SolverOptions {
    /** identifier of the car that must leave through the exit; default X */
    readonly goalCar?: string;
    /** call onProgress whenever this many more states have been explored; default 100 */
    readonly progressInterval?: number;
    readonly onProgress?: (explored: number) => void;
    /** receives debugging output describing every state explored, added or rejected */
    readonly trace?: (message: string) => void;
}

export type SolveResult =
    | {
        readonly outcome: 'solved';
        /** entries from the initial board to the winning board */
        readonly path: ReadonlyArray<FrontierEntry>;
        /** number of boards whose successors were generated */
        readonly explored: number;
        /** number of distinct boards discovered */
        readonly discovered: number;
    }
    | {
        readonly outcome: 'exhausted';
        readonly explored: number;
        readonly discovered: number;
    };

/**
 * Breadth-first search for the shortest sequence of moves that drives the
 * goal car out through the exit.
 *
 * A solver moves through the phases initializing, exploring, and then
 * either solved (a winning board was discovered) or exhausted (every board
 * reachable from the initial one was explored without finding one). Because
 * every board at depth d is discovered before any board at depth d+1 is
 * explored, the first winning board discovered ends a shortest solution.
 * A solver runs once.
 */
export class Solver {

    private readonly state = new SearchState();
    private currentPhase: SolverPhase = 'initializing';
    private readonly goalCar: string;
    private readonly progressInterval: number;

    /**
     * @param initial board to solve; not modified
     * @param options goal car and observation hooks
     * @throws Error if the goal car is not on the initial board, or the
     *         progress interval is not a positive integer
     */
    public constructor(
        private readonly initial: Board,
        private readonly options: SolverOptions = {}
    ) {
        this.goalCar = options.goalCar ?? DEFAULT_CONFIG.goalCar;
        this.progressInterval = options.progressInterval ?? DEFAULT_CONFIG.progressInterval;
        if (!initial.key().includes(this.goalCar)) {
            throw new Error(`goal car ${this.goalCar} is not on the board`);
        }
        if (!Number.isInteger(this.progressInterval) || this.progressInterval <= 0) {
            throw new Error(`invalid progress interval ${this.progressInterval}`);
        }
    }

    public get phase(): SolverPhase {
        return this.currentPhase;
    }

    /**
     * Search until solved or exhausted.
     *
     * @returns the shortest solution found, or the exhausted outcome
     */
    public run(): SolveResult {
        assert.strictEqual(this.currentPhase, 'initializing', 'a solver runs only once');

        const registered = this.state.register(this.initial, ROOT);
        assert(registered, 'a fresh search must accept its initial board');
        if (this.hasEscaped(this.initial)) {
            return this.solved(0, 0);
        }

        this.currentPhase = 'exploring';
        for (let cursor = 0; cursor < this.state.size; ++cursor) {
            if (cursor % this.progressInterval === 0) {
                this.options.onProgress?.(cursor);
            }
            const { board } = this.state.entry(cursor);
            if (this.options.trace) {
                this.options.trace(`Exploring state ${cursor}\n${indent(board.render())}`);
            }

            const escaped = forEachSuccessor(board, this.goalCar,
                (successor, move) => this.consider(successor, cursor, move));
            if (escaped) {
                return this.solved(this.state.size - 1, cursor + 1);
            }
        }

        this.currentPhase = 'exhausted';
        return { outcome: 'exhausted', explored: this.state.size, discovered: this.state.size };
    }

    // register one successor; true iff it is the winning board
    private consider(successor: Board, origin: number, move: Move): boolean {
        const added = this.state.register(successor, origin, move);
        const { trace } = this.options;
        if (trace) {
            const drawing = indent(this.state.entry(origin).board.render(successor), '    ');
            trace(added
                ? `  Added state ${this.state.size - 1} (previous ${origin})\n${drawing}`
                : `  Rejected move, already found state ${this.state.indexOf(successor)}\n${drawing}`);
        }
        if (move.kind !== 'escape') {
            return false;
        }
        assert(added, 'winning board was discovered twice');
        return true;
    }

    // goal car already parked in the last two cells of the exit row
    private hasEscaped(board: Board): boolean {
        const last = board.size - 1;
        return board.cellAt(board.exitRow, last) === this.goalCar
            && board.cellAt(board.exitRow, last - 1) === this.goalCar;
    }

    private solved(winner: number, explored: number): SolveResult {
        this.currentPhase = 'solved';
        return {
            outcome: 'solved',
            path: reconstructPath(this.state, winner),
            explored,
            discovered: this.state.size,
        };
    }
}

/**
 * Solve a board with a fresh Solver.
 *
 * @see Solver
 */
export function solve(initial: Board, options: SolverOptions = {}): SolveResult {
    return new Solver(initial, options).run();
}
