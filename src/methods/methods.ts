export * from './activation';
export * from './crossover';
export * from './mutation';
export * from './selection';
