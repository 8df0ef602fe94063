export * from './env';
export * from './schemas';
export * from './types/trading';
export * from './utils/tradingDay';
