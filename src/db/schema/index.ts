export * from './users';
export * from './cases';
export * from './evidence';
export * from './hearings';
export * from './case-reports';
export * from './inmates';
export * from './inmate-reports';
export * from './visitor-logs';
export * from './inmate-programs';
export * from './releases';
export * from './notifications';
export * from './audit-logs';
