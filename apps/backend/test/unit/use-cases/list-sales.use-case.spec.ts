import {
  DEFAULT_PAGE_SIZE,
  ListSalesUseCase,
} from '../../../src/application/use-cases/sale/list-sales.use-case';
import { SaleRepository } from '../../../src/core/domain/sale/repositories/sale.repository';
import { SaleStatus } from '../../../src/core/domain/sale/value-objects/sale-status.vo';
import { mockSaleRepository } from '../../support/mock-repositories';
import { BRANCH_ID, TENANT_ID, storedSale } from '../../support/sale.fixture';

describe('ListSalesUseCase', () => {
  let mockSaleRepo: jest.Mocked<SaleRepository>;
  let useCase: ListSalesUseCase;

  beforeEach(() => {
    mockSaleRepo = mockSaleRepository();
    mockSaleRepo.list.mockResolvedValue({ sales: [], totalCount: 0 });
    useCase = new ListSalesUseCase(mockSaleRepo);
  });

  it('should default to the first page of fifty', async () => {
    const result = await useCase.execute({ tenantId: TENANT_ID });

    expect(DEFAULT_PAGE_SIZE).toBe(50);
    expect(mockSaleRepo.list).toHaveBeenCalledWith({
      tenantId: TENANT_ID,
      branchId: undefined,
      search: undefined,
      startDate: undefined,
      endDate: undefined,
      status: undefined,
      page: 1,
      pageSize: 50,
    });
    expect(result.pagination).toEqual({ page: 1, pageSize: 50, totalCount: 0, totalPages: 0 });
  });

  it('should pass filters through and trim the search term', async () => {
    const startDate = new Date('2026-03-01T00:00:00Z');
    const endDate = new Date('2026-03-31T23:59:59Z');

    await useCase.execute({
      tenantId: TENANT_ID,
      branchId: BRANCH_ID,
      search: '  SALE2026  ',
      startDate,
      endDate,
      status: SaleStatus.COMPLETED,
      page: 3,
      pageSize: 20,
    });

    expect(mockSaleRepo.list).toHaveBeenCalledWith({
      tenantId: TENANT_ID,
      branchId: BRANCH_ID,
      search: 'SALE2026',
      startDate,
      endDate,
      status: SaleStatus.COMPLETED,
      page: 3,
      pageSize: 20,
    });
  });

  it('should drop a blank search term', async () => {
    await useCase.execute({ tenantId: TENANT_ID, search: '   ' });

    expect(mockSaleRepo.list.mock.calls[0][0].search).toBeUndefined();
  });

  it('should return the page of sales with computed total pages', async () => {
    const sale = storedSale();
    mockSaleRepo.list.mockResolvedValue({ sales: [sale], totalCount: 41 });

    const result = await useCase.execute({ tenantId: TENANT_ID, page: 2, pageSize: 20 });

    expect(result.sales).toEqual([sale]);
    expect(result.pagination).toEqual({ page: 2, pageSize: 20, totalCount: 41, totalPages: 3 });
  });
});
