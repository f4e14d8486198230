/**
 * Channel identifier generation parameters.
 */
export const CHANNEL_ID = {
    /** Characters a channel code is drawn from */
    ALPHABET: "ABCDEFGHIJKLMNOPQRSTUVWXYZ",
    /** Code length in characters */
    LENGTH: 4,
    /** Draws attempted before the generator gives up */
    MAX_ATTEMPTS: 20,
} as const;

/**
 * WebSocket close codes sent by the relay outside the error catalog.
 */
export const CloseCode = {
    NORMAL: 1000,
    GOING_AWAY: 1001,
} as const;

export type CloseCode = (typeof CloseCode)[keyof typeof CloseCode];
