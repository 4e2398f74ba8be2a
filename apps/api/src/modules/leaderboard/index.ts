// =====================================================
// Leaderboard Module
// =====================================================

export * from './leaderboard.service';
export * from './leaderboard-cache.service';
export * from './leaderboard-maintenance';
export { createLeaderboardRouter } from './leaderboard.controller';
export type { LeaderboardRouteLimits } from './leaderboard.controller';
export { createAdminRouter } from './admin.controller';
