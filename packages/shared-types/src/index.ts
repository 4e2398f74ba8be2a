// =====================================================
// Rankline Shared Types
// =====================================================

export * from './api.types';
export * from './leaderboard.types';
