export * from './configSource';
export * from './modelRegistry';
