export * from './types';
export * from './core/errors';
export * from './core/hashing';
export * from './core/state-machine';
export * from './core/fee-distribution';
export * from './crypto';
export * from './token/token-types';
export * from './token/token-registry';
export * from './payment/adapter';
export * from './marketplace/market-ledger';
export * from './marketplace/market-api';
export * from './auth/call-auth';
export * from './config/market-config';
export * from './node/event-store';
export * from './node/market-node';
export * from './node/api-server';
export * from './client/market-client';
