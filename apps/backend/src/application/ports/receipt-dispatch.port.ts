export const RECEIPT_DISPATCH = Symbol('RECEIPT_DISPATCH');

export interface ReceiptJobData {
  saleId: string;
  saleNumber: string;
  tenantId: string;
  branchId: string;
}

export interface ReceiptDispatchPort {
  enqueue(job: ReceiptJobData): Promise<void>;
}
