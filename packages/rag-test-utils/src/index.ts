export * from './factories/chunk.factory';
export * from './fakes/fake-embedding-provider';
export * from './fakes/fake-chat-provider';
export * from './helpers/http-stub.helper';
