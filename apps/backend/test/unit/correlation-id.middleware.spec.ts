import {
  CorrelationIdMiddleware,
  correlationStorage,
} from '../../src/presentation/http/rest/middleware/correlation-id.middleware';

describe('CorrelationIdMiddleware', () => {
  const tenantId = '11111111-1111-4111-8111-111111111111';
  let middleware: CorrelationIdMiddleware;
  let mockReq: any;
  let mockRes: any;

  beforeEach(() => {
    middleware = new CorrelationIdMiddleware();
    mockReq = { headers: {} };
    mockRes = { setHeader: jest.fn() };
  });

  it('should generate a correlation ID if none provided', (done) => {
    middleware.use(mockReq, mockRes, () => {
      expect(mockRes.setHeader).toHaveBeenCalledWith('x-correlation-id', expect.any(String));
      const store = correlationStorage.getStore();
      expect(store!.correlationId.length).toBeGreaterThan(0);
      done();
    });
  });

  it('should use the provided X-Correlation-Id header', (done) => {
    mockReq.headers['x-correlation-id'] = 'my-custom-correlation-id';

    middleware.use(mockReq, mockRes, () => {
      expect(mockRes.setHeader).toHaveBeenCalledWith('x-correlation-id', 'my-custom-correlation-id');
      expect(correlationStorage.getStore()?.correlationId).toBe('my-custom-correlation-id');
      done();
    });
  });

  it('should carry a valid tenant id into the context', (done) => {
    mockReq.headers['x-tenant-id'] = ` ${tenantId} `;

    middleware.use(mockReq, mockRes, () => {
      expect(correlationStorage.getStore()?.tenantId).toBe(tenantId);
      done();
    });
  });

  it('should ignore a tenant id that is not a UUID', (done) => {
    mockReq.headers['x-tenant-id'] = 'acme';

    middleware.use(mockReq, mockRes, () => {
      expect(correlationStorage.getStore()?.tenantId).toBeUndefined();
      done();
    });
  });

  it('should isolate correlation IDs between requests', (done) => {
    const ids: string[] = [];

    middleware.use(mockReq, mockRes, () => {
      ids.push(correlationStorage.getStore()!.correlationId);

      const req2 = { headers: {} } as any;
      const res2 = { setHeader: jest.fn() } as any;

      middleware.use(req2, res2, () => {
        ids.push(correlationStorage.getStore()!.correlationId);
        expect(ids[0]).not.toBe(ids[1]);
        done();
      });
    });
  });
});
