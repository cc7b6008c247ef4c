export * from './db';
export * from './text';
export * from './receiptRepository';
export * from './classificationRepository';
export * from './embeddings';
export * from './semanticIndex';
