export * from './constants.js';
export * from './errors.js';
export * from './logger.js';
export * from './config.js';
export * from './transport/types.js';
export * from './transport/tcp.js';
export * from './mux/handles.js';
export * from './mux/connection-table.js';
export * from './mux/poller.js';
export * from './mux/accept.js';
export * from './mux/peer-io.js';
export * from './mux/loop.js';
export * from './server.js';
export * from './protocol/hello.js';
export { HelloServer, type HelloServerOptions } from './hello/server.js';
export { requestHello, type HelloRequestOptions } from './hello/client.js';
export { createStatusRouter, type StatusSource } from './status/status-api.js';
export { runServer, createStatusApp, type RunServerOptions } from './run-server.js';
