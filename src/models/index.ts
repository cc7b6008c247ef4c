export * from './receipt';
export * from './product';
export * from './modelConfig';
export * from './audit';
export * from './classification';
