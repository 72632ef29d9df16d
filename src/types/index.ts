export type * from './message.types';
export type * from './leaderboard.types';
