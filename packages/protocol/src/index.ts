export * from './framing.js';
export * from './listing.js';
export * from './replies.js';
