export * from './WebServer';
