export * from './database';
export * from './llm';
export * from './transaction';
