export const CONTRACT_VERSION = '1.0.0';

export * from './messages-v1';
