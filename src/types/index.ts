export * from './mission.js';
export * from './metadata.js';
export * from './decision.js';
export * from './session.js';
