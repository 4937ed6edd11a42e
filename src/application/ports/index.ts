export * from './object-storage.port';
export * from './clock.port';
