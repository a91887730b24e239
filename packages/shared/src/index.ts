// Re-export all shared types
export * from './types/token.js';
export * from './types/user.js';
export * from './types/auth.js';
export * from './types/audit.js';
