export * from './policy';
export * from './batch';
export * from './modelResponse';
export * from './modelClient';
export * from './persist';
export * from './orchestrator';
export * from './importReceipt';
