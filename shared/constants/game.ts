// Game constants

export const GAME_CONSTANTS = {
  PARTICIPANT_COUNT: 3,
  DEFAULT_PARTICIPANTS: ['Gaurav', 'Upanshu', 'Yatin'],
  MAX_PARTICIPANT_NAME_LENGTH: 32,

  MINUTES_PER_HOUR: 60,
  MINUTES_PER_DAY: 24 * 60,
} as const;

export const RESULT_MEDALS = ['🥇', '🥈', '🥉'] as const;
export const LEADERBOARD_MEDALS = ['👑', '🏅', '🎖️'] as const;
