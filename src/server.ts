/* Copyright (c) 2021-25 MIT 6.102/6.031 course staff, all rights reserved.
 * Redistribution of original or derived work requires permission of course staff.
 */

import process from 'node:process';
import { loadConfig } from './config.js';
import { WebServer } from './webserver.js';

/**
 * Start a solving server using the given arguments.
 *
 * Command-line usage:
 *     npm start PORT [BOARDS_DIR]
 * where:
 *
 *   - PORT is an integer that specifies the server's listening port number,
 *     0 specifies that a random unused port will be automatically chosen.
 *   - BOARDS_DIR is the directory of board files served by GET /solve/<name>,
 *     `boards` if omitted.
 *
 * For example, to start a web server on port 8789 serving `boards/`:
 *     npm start 8789
 *
 * @throws Error if the arguments or settings are invalid or the server cannot start
 */
async function main(): Promise<void> {
    const [portString, boardsDirectory = 'boards']
        = process.argv.slice(2); // skip the first two arguments
                                 // (argv[0] is node executable file, argv[1] is this script)
    if (portString === undefined) { throw new Error('missing PORT'); }
    const port = parseInt(portString);
    if (isNaN(port) || port < 0) { throw new Error('invalid PORT'); }

    const server = new WebServer(loadConfig(), boardsDirectory, port);
    await server.start();
}

await main();
