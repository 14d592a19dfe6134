import { Logger } from '@nestjs/common';
import { MetricsController } from '../../src/infrastructure/observability/metrics.controller';
import { MetricsService } from '../../src/infrastructure/observability/metrics.service';

describe('MetricsController', () => {
  let controller: MetricsController;
  let mockMetrics: { getMetrics: jest.Mock; getContentType: jest.Mock };
  let mockReply: { header: jest.Mock; status: jest.Mock; send: jest.Mock };

  beforeEach(() => {
    mockMetrics = {
      getMetrics: jest.fn(),
      getContentType: jest.fn().mockReturnValue('text/plain'),
    };
    mockReply = {
      header: jest.fn().mockReturnThis(),
      status: jest.fn().mockReturnThis(),
      send: jest.fn(),
    };
    controller = new MetricsController(mockMetrics as unknown as MetricsService);
  });

  it('should set Content-Type header from getContentType', async () => {
    const contentType = 'text/plain; version=0.0.4; charset=utf-8';
    mockMetrics.getMetrics.mockResolvedValue('');
    mockMetrics.getContentType.mockReturnValue(contentType);

    await controller.getMetrics(mockReply as any);

    expect(mockReply.header).toHaveBeenCalledWith('Content-Type', contentType);
    expect(mockReply.header).toHaveBeenCalledWith('Cache-Control', 'no-store');
  });

  it('should send the metrics string via reply.send', async () => {
    const metricsOutput = 'sale_outcomes_total{outcome="created"} 4\n';
    mockMetrics.getMetrics.mockResolvedValue(metricsOutput);

    await controller.getMetrics(mockReply as any);

    expect(mockReply.send).toHaveBeenCalledWith(metricsOutput);
  });

  it('should reply 500 when collection fails', async () => {
    const errorSpy = jest.spyOn(Logger.prototype, 'error').mockImplementation();
    mockMetrics.getMetrics.mockRejectedValue(new Error('collector crashed'));

    await controller.getMetrics(mockReply as any);

    expect(mockReply.status).toHaveBeenCalledWith(500);
    expect(mockReply.send).toHaveBeenCalledWith();
    expect(errorSpy).toHaveBeenCalledWith('Failed to collect metrics', expect.any(String));
    errorSpy.mockRestore();
  });
});
