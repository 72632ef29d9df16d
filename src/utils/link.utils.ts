import { CHANNEL_ID_PREFIX, MESSAGE_LINK_BASE } from './constants';

// ============================================================================
// DEEP LINKS
// ============================================================================

/**
 * Strips the -100 prefix Telegram puts in front of channel and supergroup ids
 */
export function cleanChannelId(channelId: number): string {
    const idString = channelId.toString();
    return idString.startsWith(CHANNEL_ID_PREFIX) ? idString.slice(CHANNEL_ID_PREFIX.length) : idString;
}

export function buildMessageLink(channelId: number, messageId: number): string {
    return `${MESSAGE_LINK_BASE}/${cleanChannelId(channelId)}/${messageId}`;
}
