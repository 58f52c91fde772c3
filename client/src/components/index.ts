export { default as GuessForm } from './GuessForm';
export { default as RevealForm } from './RevealForm';
export { default as DailyRankings } from './DailyRankings';
export { default as LeaderboardTable } from './LeaderboardTable';
export { default as DataFileInfo } from './DataFileInfo';
