// Re-export all models from a single entry point
export * from './user.model';
export * from './session.model';
export * from './dataset.model';
export * from './sample.model';
export * from './annotation.model';
export * from './approval.model';
export * from './audit.model';
