export * from './QueueManager';
export * from './SessionRegistry';
export * from './ChatPoller';
