export * from './src/interfaces';
export * from './src/logger';
export { ConsoleTransport, formatJsonLine } from './src/transports/console';
