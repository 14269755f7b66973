import { App, LogLevel } from "@slack/bolt";
import { CONFIG } from "./config";
import { Economy } from "./economy";
import { MessageSender } from "./messaging";
import { logger, errorMessage } from "./logger";

export function buildSlackApp() {
    return new App({
        token: CONFIG.slack.botToken,
        socketMode: true,
        appToken: CONFIG.slack.appToken,
        signingSecret: CONFIG.slack.signingSecret,
        logLevel: LogLevel.WARN,
    });
}

/** Pays the welcome wallet when someone joins a served room. */
export async function onMemberJoined(
    economy: Economy,
    messages: MessageSender,
    event: { user: string; channel: string },
    opts: { rooms: readonly string[]; ignoredUsers: readonly string[]; symbol: string }
) {
    const { user, channel } = event;
    if (!opts.rooms.includes(channel)) return;
    if (opts.ignoredUsers.some((u) => u.toLowerCase() === user.toLowerCase())) return;

    const res = await economy.grantWelcome(user, channel);
    if (!res.ok) {
        if (res.reason !== "already_claimed") logger.warn("Welcome wallet failed", { user, room: channel, reason: res.reason });
        return;
    }
    messages.send(channel, user, `👋 Welcome! Here are ${res.value.amount} ${opts.symbol} to get you started.`);
}

export function registerOnboarding(app: App, economy: Economy, messages: MessageSender) {
    app.event("member_joined_channel", async ({ event }) => {
        try {
            await onMemberJoined(economy, messages, event, {
                rooms: CONFIG.rooms,
                ignoredUsers: CONFIG.economy.ignoredUsers,
                symbol: CONFIG.economy.currencySymbol,
            });
        } catch (e) {
            logger.error("Onboarding error", { user: event.user, room: event.channel, error: errorMessage(e) });
        }
    });
}
