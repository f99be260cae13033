export * from './request-handler';
export * from './websocket-server';
