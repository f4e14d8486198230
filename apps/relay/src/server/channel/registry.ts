import { ErrorCode, type OutboundMessage } from "@/protocol";
import type { ConnectionHandle } from "@/server/connection/types";
import type { Logger } from "@/server/core/logger";
import type {
    ActionResult,
    Channel,
    ChannelRegistryConfig,
    ChannelRegistryDependencies,
    JoinResult,
    LeaveResult,
    RegistryStats,
} from "./types";

const DEFAULT_SWEEP_INTERVAL_SEC = 60;

/**
 * Maps channel codes to their member connections.
 *
 * Every method runs synchronously on the event loop, so each call is a
 * critical section over the whole map: no other connection's handler can
 * observe or mutate the registry mid-operation. `broadcast` takes its member
 * snapshot inside that section and issues the sends after it.
 */
export class ChannelRegistry {
    private readonly config: ChannelRegistryConfig;
    private readonly logger: Logger;
    private readonly now: () => number;
    private readonly channels = new Map<string, Channel>();
    private sweepInterval: ReturnType<typeof setInterval> | null = null;

    private deliveriesAttempted = 0;
    private deliveryFailures = 0;

    constructor(deps: ChannelRegistryDependencies) {
        this.config = deps.config;
        this.logger = deps.logger.child({ context: "registry" });
        this.now = deps.now ?? Date.now;

        if (this.config.reservationTtlSec > 0) {
            this.startSweep();
        }
    }

    hasChannel(channelId: string): boolean {
        return this.channels.has(channelId);
    }

    createChannel(channelId: string): ActionResult {
        if (this.channels.has(channelId)) {
            return { success: false, errorCode: ErrorCode.CHANNEL_ALREADY_EXISTS };
        }

        this.channels.set(channelId, this.newChannel(channelId));
        this.logger.info({ channelId, totalChannels: this.channels.size }, "Channel created");

        return { success: true };
    }

    join(channelId: string, connection: ConnectionHandle): JoinResult {
        const previousChannelId = connection.channelId;

        if (previousChannelId === channelId && this.channels.get(channelId)?.members.has(connection)) {
            return { success: true, channelCreated: false, previousChannelId };
        }

        if (previousChannelId !== null) {
            this.leave(connection);
        }

        let channel = this.channels.get(channelId);
        let channelCreated = false;

        if (!channel) {
            channel = this.newChannel(channelId);
            this.channels.set(channelId, channel);
            channelCreated = true;
        }

        channel.members.add(connection);
        channel.claimed = true;
        connection.channelId = channelId;

        this.getLogger(channelId, connection).info(
            { totalMembers: channel.members.size, channelCreated, previousChannelId },
            "Connection joined channel",
        );

        return { success: true, channelCreated, previousChannelId };
    }

    leave(connection: ConnectionHandle): LeaveResult {
        const channelId = connection.channelId;

        if (channelId === null) {
            return { removed: false, reason: "not_member" };
        }

        connection.channelId = null;

        const channel = this.channels.get(channelId);
        if (!channel || !channel.members.delete(connection)) {
            this.getLogger(channelId, connection).debug("Channel reference cleared, connection was not a member");
            return { removed: false, reason: "not_member" };
        }

        const logger = this.getLogger(channelId, connection);
        logger.info({ remainingMembers: channel.members.size }, "Connection left channel");

        const channelDestroyed = channel.members.size === 0;
        if (channelDestroyed) {
            this.channels.delete(channelId);
            logger.info({ totalChannels: this.channels.size }, "Channel destroyed");
        }

        return { removed: true, channelId, channelDestroyed, remainingMembers: channel.members.size };
    }

    getMembers(channelId: string): ConnectionHandle[] {
        const channel = this.channels.get(channelId);
        return channel ? [...channel.members] : [];
    }

    /**
     * Sends `message` to every member of `channelId` except `exclude`.
     * Returns the number of deliveries attempted; a failed delivery is logged
     * and does not affect the others.
     */
    broadcast(channelId: string, message: OutboundMessage, exclude: ConnectionHandle | null): number {
        const recipients = this.getMembers(channelId).filter(member => member !== exclude);
        const logger = this.logger.child({ channelId, from: exclude?.id });

        if (recipients.length === 0) {
            logger.debug("No recipients for broadcast");
            return 0;
        }

        for (const recipient of recipients) {
            this.deliveriesAttempted++;

            recipient.send(message).catch((err: unknown) => {
                this.deliveryFailures++;
                logger.warn({ err, to: recipient.id }, "Message dropped, delivery failed");
            });
        }

        logger.debug({ recipients: recipients.length }, "Message broadcast");
        return recipients.length;
    }

    /** Removes reservations that nobody joined within the configured lifetime. */
    pruneUnclaimed(): number {
        const cutoff = this.now() - this.config.reservationTtlSec * 1000;
        let pruned = 0;

        for (const [channelId, channel] of this.channels) {
            if (!channel.claimed && channel.members.size === 0 && channel.createdAt.getTime() <= cutoff) {
                this.channels.delete(channelId);
                pruned++;
            }
        }

        if (pruned > 0) {
            this.logger.debug(
                { reservationsRemoved: pruned, remainingChannels: this.channels.size },
                "Unclaimed reservations pruned",
            );
        }

        return pruned;
    }

    getStats(): RegistryStats {
        let activeMembers = 0;

        for (const channel of this.channels.values()) {
            activeMembers += channel.members.size;
        }

        return {
            activeChannels: this.channels.size,
            activeMembers,
            deliveriesAttempted: this.deliveriesAttempted,
            deliveryFailures: this.deliveryFailures,
        };
    }

    stop(): void {
        if (this.sweepInterval) {
            clearInterval(this.sweepInterval);
            this.sweepInterval = null;
        }
    }

    private newChannel(channelId: string): Channel {
        return {
            channelId,
            members: new Set(),
            createdAt: new Date(this.now()),
            claimed: false,
        };
    }

    private startSweep(): void {
        const intervalMs = (this.config.sweepIntervalSec ?? DEFAULT_SWEEP_INTERVAL_SEC) * 1000;

        this.sweepInterval = setInterval(() => {
            this.pruneUnclaimed();
        }, intervalMs);
        this.sweepInterval.unref();
    }

    private getLogger(channelId: string, connection: ConnectionHandle): Logger {
        return this.logger.child({ channelId, connectionId: connection.id });
    }
}

export function createChannelRegistry(deps: ChannelRegistryDependencies): ChannelRegistry {
    return new ChannelRegistry(deps);
}
