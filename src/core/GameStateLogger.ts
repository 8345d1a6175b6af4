import fs from 'node:fs';
import type { GameSnapshot } from '../chess/types.js';

/**
 * Latest state pushed by a game session
 */
export interface LoggedGameState {
    timestamp: number;
    pid: number;
    screen: string;
    status: string;
    game?: GameSnapshot;
}

// Configuration flags
let loggingEnabled = false;
let stateFile: string | null = null;

let currentState: LoggedGameState | null = null;
const subscribers = new Set<(state: LoggedGameState) => void>();

/**
 * Enable or disable console event logging
 */
export const setLoggingEnabled = (enabled: boolean): void => {
    loggingEnabled = enabled;
};

export const isLoggingEnabled = (): boolean => loggingEnabled;

/**
 * Write every logged state to this file; null turns file output off
 */
export const setStateFile = (file: string | null): void => {
    stateFile = file;
};

/**
 * Tagged console line, e.g. "[Chess] e2e4 played"
 */
export const logGameEvent = (tag: string, message: string): void => {
    if (loggingEnabled) {
        console.log(`[${tag}] ${message}`);
    }
};

/**
 * Records the current game state, notifies subscribers and, when a state
 * file is set, writes the board plus structured JSON to it.
 *
 * @param screenName - What is being shown (e.g. "Chess")
 * @param status - A short status string (e.g. "White to move", "Checkmate")
 * @param visualContent - ASCII rendering of the board
 */
export const logGameState = (
    screenName: string,
    status: string,
    visualContent: string,
    structuredState?: GameSnapshot
): void => {
    const now = Date.now();

    const state: LoggedGameState = {
        timestamp: now,
        pid: process.pid,
        screen: screenName,
        status,
        game: structuredState,
    };
    currentState = state;
    for (const callback of subscribers) {
        callback(state);
    }

    if (!stateFile) return;

    let content = `PROCESS ID: ${process.pid}\n`;
    content += `TIMESTAMP: ${now}\n`;
    content += `CURRENT SCREEN: ${screenName}\n`;
    content += `STATUS: ${status}\n`;
    content += `\nVISUAL STATE:\n`;
    content += `${visualContent}\n`;

    if (structuredState) {
        content += `\n--- STRUCTURED STATE (JSON) ---\n`;
        content += JSON.stringify(structuredState, null, 2);
        content += `\n--- END STRUCTURED STATE ---\n`;
    }

    try {
        fs.writeFileSync(stateFile, content, 'utf-8');
    } catch (err) {
        // A failed write must not interrupt the game
        console.warn(`[State] Could not write ${stateFile}: ${err instanceof Error ? err.message : String(err)}`);
    }
};

/**
 * Get the most recently logged state
 */
export const getCurrentState = (): LoggedGameState | null => {
    return currentState;
};

/**
 * Subscribe to state updates
 * Returns an unsubscribe function
 */
export const subscribeToState = (callback: (state: LoggedGameState) => void): () => void => {
    subscribers.add(callback);
    return () => {
        subscribers.delete(callback);
    };
};
