export * from './provider.types';
export * from './store.types';
