// =====================================================
// Middleware Barrel Export
// =====================================================

export * from './validation.middleware';
export * from './request-id.middleware';
export * from './request-signal.middleware';
export * from './error-handler.middleware';
