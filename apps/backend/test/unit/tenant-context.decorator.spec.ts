import { ExecutionContext } from '@nestjs/common';
import { ValidationError } from '../../src/application/errors/application.error';
import { extractTenantContext } from '../../src/presentation/http/rest/decorators/tenant-context.decorator';

describe('TenantContext decorator', () => {
  const tenantId = '11111111-1111-4111-8111-111111111111';
  const branchId = '22222222-2222-4222-8222-222222222222';
  const userId = '33333333-3333-4333-8333-333333333333';

  const createMockContext = (headers: Record<string, string | string[]>): ExecutionContext =>
    ({
      switchToHttp: () => ({
        getRequest: () => ({ headers }),
      }),
    }) as unknown as ExecutionContext;

  const validHeaders = {
    'x-tenant-id': tenantId,
    'x-branch-id': branchId,
    'x-user-id': userId,
  };

  it('should build the request context from the identity headers', () => {
    expect(extractTenantContext(createMockContext(validHeaders))).toEqual({
      tenantId,
      branchId,
      userId,
    });
  });

  it('should trim header values', () => {
    const ctx = createMockContext({ ...validHeaders, 'x-user-id': `  ${userId}  ` });
    expect(extractTenantContext(ctx).userId).toBe(userId);
  });

  it('should use the first value of a repeated header', () => {
    const ctx = createMockContext({ ...validHeaders, 'x-branch-id': [branchId, tenantId] });
    expect(extractTenantContext(ctx).branchId).toBe(branchId);
  });

  it('should throw ValidationError when a header is missing', () => {
    const ctx = createMockContext({ 'x-tenant-id': tenantId, 'x-user-id': userId });
    expect(() => extractTenantContext(ctx)).toThrow(ValidationError);
  });

  it('should name every invalid header in the error fields', () => {
    const ctx = createMockContext({ 'x-tenant-id': 'acme', 'x-user-id': userId });
    let caught: unknown;
    try {
      extractTenantContext(ctx);
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(ValidationError);
    const error = caught as ValidationError;
    expect(error.code).toBe('VALIDATION_ERROR');
    expect(error.message).toBe('Missing or invalid identity headers: X-Tenant-Id, X-Branch-Id.');
    expect(error.fields).toEqual({ 'X-Tenant-Id': 'Must be a UUID', 'X-Branch-Id': 'Must be a UUID' });
  });
});
