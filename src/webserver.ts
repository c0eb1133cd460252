/* Copyright (c) 2021-25 MIT 6.102/6.031 course staff, all rights reserved.
 * Redistribution of original or derived work requires permission of course staff.
 */

import { Server } from 'node:http';
import path from 'node:path';
import express, { Application, Request, Response, NextFunction } from 'express';
import { StatusCodes } from 'http-status-codes';
import { Board } from './board.js';
import { solveBoard } from './commands.js';
import { SolverConfig } from './config.js';

/**
 * HTTP server that solves boards on request.
 */
export class WebServer {

    private readonly app: Application;
    private server: Server | undefined;

    /**
     * Make a new solving server that listens for connections on port.
     *
     * @param config solver settings used for every request
     * @param boardsDirectory directory searched by GET /solve/<name>
     * @param requestedPort server port number; 0 picks an unused port
     */
    public constructor(
        private readonly config: SolverConfig,
        private readonly boardsDirectory: string,
        private readonly requestedPort: number
    ) {
        this.app = express();
        this.app.use((request: Request, response: Response, next: NextFunction) => {
            // allow requests from web pages hosted anywhere
            response.set('Access-Control-Allow-Origin', '*');
            next();
        });
        this.app.use(express.text({ type: '*/*' }));

        /*
         * POST /solve
         * Request body is a board in the board file format.
         *
         * Response is the solution, or an explanation of why there is none.
         */
        this.app.post('/solve', (request: Request, response: Response) => {
            const body: unknown = request.body;
            let board: Board;
            try {
                board = Board.parse(typeof body === 'string' ? body : '');
            } catch (err) {
                response
                .status(StatusCodes.BAD_REQUEST) // 400
                .type('text')
                .send(`invalid board: ${errorMessage(err)}`);
                return;
            }
            this.sendSolution(board, response);
        });

        /*
         * GET /solve/<name>
         * name must be a nonempty string of alphanumeric, hyphen or underscore characters
         *
         * Solves the board file <name>.txt in the boards directory.
         */
        this.app.get('/solve/:name', async (request: Request, response: Response) => {
            const { name } = request.params;
            if (name === undefined || !/^[\w-]+$/.test(name)) {
                response.status(StatusCodes.BAD_REQUEST).type('text').send('invalid board name');
                return;
            }
            let board: Board;
            try {
                board = await Board.parseFromFile(path.join(this.boardsDirectory, `${name}.txt`));
            } catch (err) {
                const missing = err instanceof Error && 'code' in err && err.code === 'ENOENT';
                response
                .status(missing ? StatusCodes.NOT_FOUND : StatusCodes.BAD_REQUEST) // 404 or 400
                .type('text')
                .send(missing ? `no board named ${name}` : `invalid board: ${errorMessage(err)}`);
                return;
            }
            try {
                this.sendSolution(board, response);
            } catch (err) {
                // a rejected promise here would escape express
                response
                .status(StatusCodes.INTERNAL_SERVER_ERROR) // 500
                .type('text')
                .send(`server error: ${errorMessage(err)}`);
            }
        });
    }

    private sendSolution(board: Board, response: Response): void {
        const { goalCar } = this.config;
        if (!board.cars().has(goalCar)) {
            response
            .status(StatusCodes.BAD_REQUEST) // 400
            .type('text')
            .send(`invalid board: goal car ${goalCar} is not on the board`);
            return;
        }
        const report = solveBoard(board, this.config);
        response
        .status(report.solved ? StatusCodes.OK : StatusCodes.UNPROCESSABLE_ENTITY) // 200 or 422
        .type('text')
        .send(report.text);
    }

    /**
     * Start this server.
     *
     * @returns (a promise that) resolves when the server is listening
     */
    public start(): Promise<void> {
        return new Promise(resolve => {
            this.server = this.app.listen(this.requestedPort);
            this.server.on('listening', () => {
                console.log(`server now listening at http://localhost:${this.port}`);
                resolve();
            });
        });
    }

    /**
     * @returns the actual port that server is listening at. (May be different
     *          than the requestedPort used in the constructor, since if
     *          requestedPort = 0 then an arbitrary available port is chosen.)
     *          Requires that start() has already been called and completed.
     */
    public get port(): number {
        const address = this.server?.address() ?? 'not connected';
        if (typeof address === 'string') {
            throw new Error('server is not listening at a port');
        }
        return address.port;
    }

    /**
     * Stop this server and drop its open connections. Once stopped, this
     * server cannot be restarted.
     *
     * @returns (a promise that) resolves when the server has closed
     */
    public stop(): Promise<void> {
        return new Promise((resolve, reject) => {
            const server = this.server;
            if (server === undefined) {
                resolve();
                return;
            }
            server.close(err => err ? reject(err) : resolve());
            server.closeAllConnections();
            console.log('server stopped');
        });
    }
}

function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
