export * from './inMemoryCollection';
export * from './catalogScope';
export * from './transactionsScope';
export * from './testApp';
export * from './fixtures';
