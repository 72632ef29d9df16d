import type { Leaderboard } from '../types';
import { formatLeaderboardLines, formatLeaderboardTitle, toJSONOutput } from './output';

const leaderboard: Leaderboard = {
  chatName: 'Test Channel',
  channelId: -1001234567890,
  year: 2023,
  timezone: '+0300',
  limit: 5,
  totalMessages: 40,
  eligibleMessages: 2,
  entries: [
    {
      rank: 1,
      messageId: 11,
      localDate: '2023-03-01 11:05',
      link: 'https://t.me/c/1234567890/11',
      totalReactions: 7,
      preview: 'second',
    },
    {
      rank: 2,
      messageId: 10,
      localDate: '2023-06-15 15:00',
      link: 'https://t.me/c/1234567890/10',
      totalReactions: 2,
      preview: 'first',
    },
  ],
};

describe('formatLeaderboardTitle', () => {
  it('should name the limit, year and timezone', () => {
    expect(formatLeaderboardTitle(leaderboard)).toBe('Top 5 messages for 2023 (TZ: +0300)');
  });
});

describe('formatLeaderboardLines', () => {
  it('should render one line per entry', () => {
    expect(formatLeaderboardLines(leaderboard)).toEqual([
      '1. 2023-03-01 11:05 - https://t.me/c/1234567890/11 (Reactions: 7)',
      '2. 2023-06-15 15:00 - https://t.me/c/1234567890/10 (Reactions: 2)',
    ]);
  });

  it('should render nothing for an empty leaderboard', () => {
    expect(formatLeaderboardLines({ ...leaderboard, entries: [] })).toEqual([]);
  });
});

describe('toJSONOutput', () => {
  it('should expose the chat, configuration and entries', () => {
    expect(toJSONOutput(leaderboard)).toEqual({
      chat: { name: 'Test Channel', id: -1001234567890 },
      year: 2023,
      timezone: '+0300',
      limit: 5,
      totalMessages: 40,
      eligibleMessages: 2,
      top: leaderboard.entries,
    });
  });

  it('should use null for a missing chat name', () => {
    expect(toJSONOutput({ ...leaderboard, chatName: undefined }).chat.name).toBeNull();
  });
});
