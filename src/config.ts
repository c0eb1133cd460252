/* Copyright (c) 2021-25 MIT 6.102/6.031 course staff, all rights reserved.
 * Redistribution of original or derived work requires permission of course staff.
 */

import process from 'node:process';

/** Settings shared by the command-line solver and the server. */
export interface SolverConfig {
    /** identifier of the car that must leave through the exit */
    readonly goalCar: string;
    /** report progress each time this many more states have been explored */
    readonly progressInterval: number;
    /** print every explored, added and rejected state */
    readonly trace: boolean;
}

export const DEFAULT_CONFIG: SolverConfig = {
    goalCar: 'X',
    progressInterval: 100,
    trace: false,
};

/**
 * Read solver settings from environment variables:
 *   GOAL_CAR            one letter or digit (default X)
 *   PROGRESS_INTERVAL   positive integer (default 100)
 *   DEBUG_SEARCH        1 or true to trace the search
 *
 * @param env environment to read
 * @returns the settings, defaults filled in
 * @throws Error if a variable is set to an invalid value
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): SolverConfig {
    const goalCar = env['GOAL_CAR'] ?? DEFAULT_CONFIG.goalCar;
    if (!/^[A-Za-z0-9]$/.test(goalCar)) {
        throw new Error(`invalid GOAL_CAR '${goalCar}': expected one letter or digit`);
    }

    const interval = env['PROGRESS_INTERVAL'];
    const progressInterval = interval === undefined ? DEFAULT_CONFIG.progressInterval : Number(interval);
    if (!Number.isInteger(progressInterval) || progressInterval <= 0) {
        throw new Error(`invalid PROGRESS_INTERVAL '${interval}': expected a positive integer`);
    }

    const trace = env['DEBUG_SEARCH'] === '1' || env['DEBUG_SEARCH'] === 'true';
    return { goalCar, progressInterval, trace };
}
