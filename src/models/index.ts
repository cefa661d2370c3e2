export * from './Player';
export * from './Dataset';
export * from './Errors';
