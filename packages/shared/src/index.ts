export * from './types/records.js';
export * from './types/api.js';
export * from './types/websocket.js';
