// Barrel export for all shared types
export * from './oso.js';
