/**
 * Identity of the caller, already authenticated upstream. Every query and
 * mutation is scoped to `tenantId`; sales and inventory writes also to
 * `branchId`.
 */
export interface RequestContext {
  tenantId: string;
  branchId: string;
  userId: string;
}
