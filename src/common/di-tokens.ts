export const DI_TOKENS = {
  CATALOG_REPOSITORY: Symbol('CATALOG_REPOSITORY'),
  PERFORMANCE_REPOSITORY: Symbol('PERFORMANCE_REPOSITORY'),
  RESERVATION_REPOSITORY: Symbol('RESERVATION_REPOSITORY'),
} as const;
