/* Copyright (c) 2021-25 MIT 6.102/6.031 course staff, all rights reserved.
 * Redistribution of original or derived work requires permission of course staff.
 */

import assert from 'node:assert';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { Board, EMPTY } from '../src/board.js';
import { ONE_BLOCKER, SIX_MOVES, TRIVIAL, VACATE, boardOf } from './boards.js';

/**
 * Tests for the Board abstract data type.
 */
describe('Board', function() {

    // Testing strategy
    //   parse: valid board; header invalid, not square; wrong number of rows;
    //          no exit row, two exit rows; invalid cell; car bent, split, single cell
    //   cellAt, setCell: in range, out of range
    //   cellAtOrDefault: in range, each edge out of range
    //   key, equals, copy: equal boards, different boards, copy independent of original
    //   cars: horizontal and vertical cars, lengths 2 and 3
    //   render: no successor; slide left, right, up, down; car leaving the board;
    //           changed cell no move explains
    //   toString: round trip through parse
    //   parseFromFile: valid file, missing file

    it('parses size, exit row and cells', function() {
        const board = boardOf(...ONE_BLOCKER);
        assert.strictEqual(board.size, 6);
        assert.strictEqual(board.exitRow, 2);
        assert.strictEqual(board.cellAt(2, 3), 'X');
        assert.strictEqual(board.cellAt(1, 5), 'A');
        assert.strictEqual(board.cellAt(0, 0), EMPTY);
    });

    it('ignores blank lines and surrounding whitespace', function() {
        const board = Board.parse('\n  3x3  \n\nAA.\n XX.> \n...\n\n');
        assert.strictEqual(board.exitRow, 1);
        assert.strictEqual(board.cellAt(1, 1), 'X');
    });

    it('rejects malformed text', function() {
        const cases: Array<[string, string]> = [
            ['', 'empty board file'],
            ['six\n', "invalid board header 'six'"],
            ['3x4\n', 'board must be square, got 3x4'],
            ['1x1\nX>\n', 'board is too small: 1x1'],
            ['3x3\nXX.>\n...\n', 'expected 3 rows, got 2'],
            ['3x3\nXX.\n...\n...\n', "no exit row marked with '>'"],
            ['3x3\nXX.>\n...>\n...\n', 'more than one exit row marked: rows 0, 1'],
            ['3x3\nXX.>\n..\n...\n', 'row 1 has 2 cells, expected 3'],
            ['3x3\nXX.>\n.#.\n...\n', "invalid cell '#' in row 1"],
            ['3x3\nXX.>\n.A.\n..A\n', 'car A is not a straight contiguous run'],
            ['3x3\nXX.>\nA.A\n...\n', 'car A is not a straight contiguous run'],
            ['3x3\nXX.>\n.A.\n...\n', 'car A occupies a single cell'],
        ];
        for (const [text, message] of cases) {
            assert.throws(() => Board.parse(text), { message }, JSON.stringify(text));
        }
    });

    it('cellAt and setCell reject cells off the board', function() {
        const board = boardOf(...TRIVIAL);
        assert.throws(() => board.cellAt(6, 0), assert.AssertionError);
        assert.throws(() => board.cellAt(0, -1), assert.AssertionError);
        assert.throws(() => board.setCell(-1, 0, 'Q'), assert.AssertionError);
    });

    it('cellAtOrDefault is empty off the board', function() {
        const board = boardOf(...TRIVIAL);
        assert.strictEqual(board.cellAtOrDefault(2, 4), 'X');
        assert.strictEqual(board.cellAtOrDefault(-1, 3), EMPTY);
        assert.strictEqual(board.cellAtOrDefault(6, 3), EMPTY);
        assert.strictEqual(board.cellAtOrDefault(2, -1), EMPTY);
        assert.strictEqual(board.cellAtOrDefault(2, 6), EMPTY);
    });

    it('compares boards by their cells', function() {
        const board = boardOf(...TRIVIAL);
        const same = boardOf(...TRIVIAL);
        const other = boardOf(...ONE_BLOCKER);
        assert(board.equals(same));
        assert.strictEqual(board.key(), same.key());
        assert(!board.equals(other));
        assert.notStrictEqual(board.key(), other.key());
    });

    it('copy is independent of the original', function() {
        const board = boardOf(...TRIVIAL);
        const copy = board.copy();
        assert(copy.equals(board));
        assert.strictEqual(copy.exitRow, board.exitRow);
        copy.setCell(0, 0, 'Q');
        assert.strictEqual(board.cellAt(0, 0), EMPTY);
        assert(!copy.equals(board));
    });

    it('locates every car', function() {
        const cars = boardOf(...SIX_MOVES).cars();
        assert.deepStrictEqual([...cars.keys()], ['A', 'B', 'C', 'X', 'D', 'E', 'F']);
        assert.deepStrictEqual(cars.get('B'), { id: 'B', row: 0, column: 5, length: 3, orientation: 'vertical' });
        assert.deepStrictEqual(cars.get('X'), { id: 'X', row: 2, column: 1, length: 2, orientation: 'horizontal' });
        assert.deepStrictEqual(cars.get('F'), { id: 'F', row: 5, column: 2, length: 3, orientation: 'horizontal' });
    });

    it('renders a board without a successor', function() {
        assert.strictEqual(boardOf(...ONE_BLOCKER).render(), [
            '......',
            '.....A',
            '...XXA',
            '......',
            '......',
            '......',
        ].join('\n'));
    });

    it('renders a slide to the right with an arrow', function() {
        const before = boardOf(...TRIVIAL);
        const after = boardOf('......', '......', '....XX>', '......', '......', '......');
        assert.strictEqual(before.render(after).split('\n')[2], '...XX>');
    });

    it('renders a slide to the left with an arrow', function() {
        const before = boardOf(...TRIVIAL);
        const after = boardOf('......', '......', '..XX..>', '......', '......', '......');
        assert.strictEqual(before.render(after).split('\n')[2], '..<XX.');
    });

    it('renders vertical slides with arrows', function() {
        const before = boardOf(...ONE_BLOCKER);
        const up = boardOf('.....A', '.....A', '...XX.>', '......', '......', '......');
        assert.deepStrictEqual(before.render(up).split('\n').slice(0, 3), ['.....^', '.....A', '...XXA']);
        const down = boardOf('......', '......', '...XXA>', '.....A', '......', '......');
        assert.deepStrictEqual(before.render(down).split('\n').slice(1, 4), ['.....A', '...XXA', '.....v']);
    });

    it('renders a car leaving the board through the exit', function() {
        const before = boardOf(...VACATE);
        const after = boardOf('......', '......', 'XX....>', '......', '......', '......');
        assert.strictEqual(before.render(after).split('\n')[2], 'XX.CC>>');
    });

    it('render rejects a change no single move explains', function() {
        const before = boardOf(...TRIVIAL);
        const after = before.copy();
        after.setCell(0, 0, 'Q');
        assert.throws(() => before.render(after), assert.AssertionError);
    });

    it('toString round-trips through parse', function() {
        const board = boardOf(...ONE_BLOCKER);
        assert.strictEqual(board.toString(), '6x6\n......\n.....A\n...XXA>\n......\n......\n......\n');
        const parsed = Board.parse(board.toString());
        assert(parsed.equals(board));
        assert.strictEqual(parsed.exitRow, board.exitRow);
    });

    it('parseFromFile reads a board file', async function() {
        const dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'board-test-'));
        try {
            const filename = path.join(dir, 'blocked.txt');
            await fs.promises.writeFile(filename, boardOf(...ONE_BLOCKER).toString());
            const board = await Board.parseFromFile(filename);
            assert(board.equals(boardOf(...ONE_BLOCKER)));
            await assert.rejects(Board.parseFromFile(path.join(dir, 'missing.txt')), { code: 'ENOENT' });
        } finally {
            await fs.promises.rm(dir, { recursive: true, force: true });
        }
    });
});
