import { randomInt } from "node:crypto";
import { CHANNEL_ID, ErrorCode } from "@/protocol";
import type { GenerateResult } from "./types";

/** Returns an integer in [0, max). */
export type RandomIndex = (max: number) => number;

export type ChannelIdGeneratorOptions = Readonly<{
    alphabet?: string;
    length?: number;
    maxAttempts?: number;
    randomIndex?: RandomIndex;
}>;

/**
 * Draws short channel codes, retrying while the drawn code is taken.
 *
 * Generation has no side effects: the caller registers the returned code in
 * the same synchronous step that checked it.
 */
export class ChannelIdGenerator {
    private readonly alphabet: string;
    private readonly length: number;
    private readonly maxAttempts: number;
    private readonly randomIndex: RandomIndex;

    constructor(options: ChannelIdGeneratorOptions = {}) {
        this.alphabet = options.alphabet ?? CHANNEL_ID.ALPHABET;
        this.length = options.length ?? CHANNEL_ID.LENGTH;
        this.maxAttempts = options.maxAttempts ?? CHANNEL_ID.MAX_ATTEMPTS;
        this.randomIndex = options.randomIndex ?? randomInt;
    }

    generate(exists: (channelId: string) => boolean): GenerateResult {
        for (let attempt = 0; attempt < this.maxAttempts; attempt++) {
            const channelId = this.draw();

            if (!exists(channelId)) {
                return { success: true, channelId };
            }
        }

        return {
            success: false,
            errorCode: ErrorCode.CHANNEL_ID_EXHAUSTED,
            message: `No free channel identifier after ${this.maxAttempts} attempts`,
        };
    }

    private draw(): string {
        let channelId = "";

        for (let i = 0; i < this.length; i++) {
            channelId += this.alphabet.charAt(this.randomIndex(this.alphabet.length));
        }

        return channelId;
    }
}

export function createChannelIdGenerator(options?: ChannelIdGeneratorOptions): ChannelIdGenerator {
    return new ChannelIdGenerator(options);
}
