// Core game types
export * from './types/game';
export * from './types/leaderboard';
export * from './types/snapshot';
export * from './types/network';

// Constants
export * from './constants/game';

// Utilities
export * from './utils/time';
export * from './utils/validation';
export * from './utils/record';
