export * from './authorize';
export * from './callback';
export * from './client-info';
export * from './metadata';
export * from './registration';
export * from './revoke';
export * from './token';
