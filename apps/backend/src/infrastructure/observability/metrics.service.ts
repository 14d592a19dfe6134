import { Injectable, OnModuleInit } from '@nestjs/common';
import * as client from 'prom-client';

export type SaleOutcome =
  | 'created'
  | 'insufficient_inventory'
  | 'inventory_not_found'
  | 'sale_number_exhausted'
  | 'rejected'
  | 'failed';

@Injectable()
export class MetricsService implements OnModuleInit {
  // Rate
  readonly httpRequestTotal = new client.Counter({
    name: 'http_requests_total',
    help: 'Total HTTP requests',
    labelNames: ['method', 'route', 'status_code'] as const,
  });

  // Errors
  readonly httpErrorTotal = new client.Counter({
    name: 'http_errors_total',
    help: 'Total HTTP errors (4xx/5xx)',
    labelNames: ['method', 'route', 'status_code'] as const,
  });

  // Duration
  readonly httpRequestDuration = new client.Histogram({
    name: 'http_request_duration_seconds',
    help: 'HTTP request duration in seconds',
    labelNames: ['method', 'route', 'status_code'] as const,
    buckets: [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1],
  });

  // Business metrics
  readonly saleOutcomeTotal = new client.Counter({
    name: 'sale_outcomes_total',
    help: 'Sale creation outcomes by result',
    labelNames: ['outcome'] as const,
  });

  readonly saleLineItemsTotal = new client.Counter({
    name: 'sale_line_items_total',
    help: 'Line items on committed sales',
  });

  onModuleInit(): void {
    client.collectDefaultMetrics({ prefix: 'pharmacy_' });
  }

  recordSaleOutcome(outcome: SaleOutcome, lineItems = 0): void {
    this.saleOutcomeTotal.inc({ outcome });
    if (outcome === 'created' && lineItems > 0) {
      this.saleLineItemsTotal.inc(lineItems);
    }
  }

  async getMetrics(): Promise<string> {
    return client.register.metrics();
  }

  getContentType(): string {
    return client.register.contentType;
  }
}
