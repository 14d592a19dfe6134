export const RECEIPT_QUEUE = 'receipt-generation';
export const RECEIPT_JOB = 'generate-receipt';
