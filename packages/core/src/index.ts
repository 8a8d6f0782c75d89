export {
  DomainError,
  ValidationError,
  NotFoundError,
  ConflictError,
  UnauthorizedError,
  ForbiddenError,
  EntityIdSchema,
  TenantIdSchema,
  PaginationSchema,
  buildPaginatedResult,
} from './common/types';

export type { BaseEntity, CreateInput, EntityId, Optional, Pagination, PaginatedResult, TenantId } from './common/types';

export * from './users/types';
export * from './leads/types';
export * from './email/types';
export * from './email/lifecycle';
export * from './email/stats';
export * from './templates/renderer';
export { htmlToText } from './templates/html-to-text';
