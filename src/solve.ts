/* Copyright (c) 2021-25 MIT 6.102/6.031 course staff, all rights reserved.
 * Redistribution of original or derived work requires permission of course staff.
 */

import process from 'node:process';
import { Board } from './board.js';
import { describeInitial, solveBoard } from './commands.js';
import { loadConfig } from './config.js';

/**
 * Solve one board from the command line.
 *
 * Command-line usage:
 *     npm run solve -- FILENAME
 * where FILENAME is the path to a valid board file.
 *
 * For example, to solve the board in `boards/starter.txt`:
 *     npm run solve -- boards/starter.txt
 *
 * Settings come from the environment (see loadConfig). The process exits
 * with status 0 when the board is solved and 1 when no solution exists.
 *
 * @throws Error if the arguments or settings are invalid, or the file cannot
 *         be read or parsed
 */
async function main(): Promise<void> {
    const [filename] = process.argv.slice(2); // skip the node executable and this script
    if (filename === undefined) { throw new Error('missing FILENAME'); }

    const config = loadConfig();
    const board = await Board.parseFromFile(filename);
    console.log(describeInitial(board));

    const report = solveBoard(board, config, line => console.log(line));
    console.log(report.text);
    if (!report.solved) {
        process.exitCode = 1;
    }
}

await main();
