export * from './config/env.js';
export * from './infrastructure/logger.js';
export * from './transport/core-routes.js';
export * from './transport/error-handler.js';
export * from './transport/http-server.js';
export * from './transport/route-helpers.js';
