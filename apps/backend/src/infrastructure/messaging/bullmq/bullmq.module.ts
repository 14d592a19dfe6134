import { Module, Global } from '@nestjs/common';
import { BullModule } from '@nestjs/bullmq';
import { ConfigService } from '@nestjs/config';
import { ReceiptDispatchProducer } from './receipt-dispatch.producer';
import { RECEIPT_QUEUE } from './bullmq.tokens';
import { RECEIPT_DISPATCH } from '@/application/ports/receipt-dispatch.port';

@Global()
@Module({
  imports: [
    BullModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => ({
        connection: {
          host: configService.get<string>('REDIS_HOST', 'localhost'),
          port: configService.get<number>('REDIS_PORT', 6379),
          password: configService.get<string>('REDIS_PASSWORD'),
        },
      }),
    }),
    BullModule.registerQueueAsync({
      name: RECEIPT_QUEUE,
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => ({
        defaultJobOptions: {
          attempts: configService.get<number>('RECEIPT_JOB_ATTEMPTS', 3),
          // 1s, 2s, 4s
          backoff: {
            type: 'exponential',
            delay: 1000,
          },
          removeOnComplete: 100,
          removeOnFail: false,
        },
      }),
    }),
  ],
  providers: [
    ReceiptDispatchProducer,
    {
      provide: RECEIPT_DISPATCH,
      useExisting: ReceiptDispatchProducer,
    },
  ],
  exports: [RECEIPT_DISPATCH],
})
export class BullmqModule {}
