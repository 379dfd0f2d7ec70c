export * from './core';
export * from './members';
export * from './plans';
export * from './memberships';
export * from './attendance';
export * from './payments';
