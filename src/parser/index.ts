export * from './normalize';
export * from './receiptParser';
