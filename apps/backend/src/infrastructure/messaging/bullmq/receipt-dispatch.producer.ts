import { Injectable, Logger } from '@nestjs/common';
import { InjectQueue } from '@nestjs/bullmq';
import { Queue } from 'bullmq';
import { ReceiptDispatchPort, ReceiptJobData } from '@/application/ports/receipt-dispatch.port';
import { RECEIPT_JOB, RECEIPT_QUEUE } from './bullmq.tokens';

@Injectable()
export class ReceiptDispatchProducer implements ReceiptDispatchPort {
  private readonly logger = new Logger(ReceiptDispatchProducer.name);

  constructor(
    @InjectQueue(RECEIPT_QUEUE)
    private readonly queue: Queue<ReceiptJobData>,
  ) {}

  async enqueue(job: ReceiptJobData): Promise<void> {
    // jobId dedupes repeated enqueues for the same sale.
    await this.queue.add(RECEIPT_JOB, job, {
      jobId: `receipt-${job.saleId}`,
    });
    this.logger.log(`Enqueued receipt generation: ${job.saleNumber}`);
  }
}
