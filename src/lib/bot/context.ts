import type { Context, SessionFlavor } from 'grammy';

/**
 * Per-user conversation state: the last serial the user typed
 */
export interface SerialSession {
    serial?: string;
}

export type BotContext = Context & SessionFlavor<SerialSession>;

/**
 * Session key "<chat id>:<user id>" so two people in the same group keep
 * separate serials. Updates without both (channel posts, inline results)
 * have no session.
 */
export function sessionKey(ctx: Pick<Context, 'chat' | 'from'>): string | undefined {
    return ctx.chat && ctx.from ? `${ctx.chat.id}:${ctx.from.id}` : undefined;
}
