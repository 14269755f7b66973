import { randomUUID } from "crypto";
import { logger, errorMessage } from "./logger";

/** Users currently eligible for ambient rewards in a room, disallowed accounts already removed. */
export interface PresenceProvider {
    connectedUsers(room: string): Promise<string[]>;
}

/** Fire-and-forget delivery; each call returns a token that delivery failures are logged under. */
export interface MessageSender {
    send(room: string, user: string, text: string): string;
    broadcast(room: string, text: string): string;
}

/** The slice of the Slack web client the adapters call. */
export interface SlackChatClient {
    chat: {
        postMessage(args: { channel: string; text: string }): Promise<unknown>;
    };
}

export interface SlackMembersClient {
    conversations: {
        members(args: { channel: string; cursor?: string; limit?: number }): Promise<{
            members?: string[];
            response_metadata?: { next_cursor?: string };
        }>;
    };
}

export class SlackMessageSender implements MessageSender {
    constructor(private readonly client: SlackChatClient) {}

    /** Slack opens a DM when the channel is a user id. */
    send(room: string, user: string, text: string): string {
        return this.post(user, text, { room, user });
    }

    broadcast(room: string, text: string): string {
        return this.post(room, text, { room });
    }

    private post(channel: string, text: string, ctx: Record<string, unknown>): string {
        const token = randomUUID();
        void this.client.chat.postMessage({ channel, text }).then(
            () => logger.debug("Message delivered", { token, ...ctx }),
            (e: unknown) => logger.warn("Message delivery failed", { token, ...ctx, error: errorMessage(e) })
        );
        return token;
    }
}

export class SlackPresenceProvider implements PresenceProvider {
    private readonly excluded: Set<string>;

    constructor(private readonly client: SlackMembersClient, excludedUsers: readonly string[] = []) {
        this.excluded = new Set(excludedUsers.map((u) => u.toLowerCase()));
    }

    async connectedUsers(room: string): Promise<string[]> {
        const users: string[] = [];
        let cursor: string | undefined;
        do {
            const page = await this.client.conversations.members({ channel: room, cursor, limit: 200 });
            for (const id of page.members ?? []) {
                if (!this.excluded.has(id.toLowerCase())) users.push(id);
            }
            cursor = page.response_metadata?.next_cursor || undefined;
        } while (cursor);
        return users;
    }
}
