import type { ErrorCode } from "@/protocol";
import type { Logger } from "@/server/core/logger";
import type { ConnectionHandle } from "@/server/connection/types";

export interface Channel {
    channelId: string;
    members: Set<ConnectionHandle>;
    createdAt: Date;
    /** Set once any connection has joined; unclaimed channels are reservations. */
    claimed: boolean;
}

export type ChannelRegistryConfig = Readonly<{
    /** Lifetime of a reservation nobody joined; 0 keeps reservations forever. */
    reservationTtlSec: number;
    sweepIntervalSec?: number;
}>;

export type ChannelRegistryDependencies = Readonly<{
    config: ChannelRegistryConfig;
    logger: Logger;
    now?: () => number;
}>;

export interface RegistryStats {
    activeChannels: number;
    activeMembers: number;
    deliveriesAttempted: number;
    deliveryFailures: number;
}

export type ActionResult = { success: true } | { success: false; errorCode: ErrorCode; message?: string };

export type GenerateResult = { success: true; channelId: string } | { success: false; errorCode: ErrorCode; message?: string };

export type JoinResult = {
    success: true;
    channelCreated: boolean;
    previousChannelId: string | null;
};

export type LeaveResult =
    | { removed: true; channelId: string; channelDestroyed: boolean; remainingMembers: number }
    | { removed: false; reason: "not_member" };
