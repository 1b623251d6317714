export * from './schemas';
export * from './audit-actions';
