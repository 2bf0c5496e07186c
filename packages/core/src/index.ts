// Domain exports
export * from './domain/entities/index.ts';
export * from './domain/value-objects/index.ts';
export * from './domain/errors/index.ts';

// Application ports
export * from './application/ports/index.ts';

// Application services
export * from './application/services/index.ts';

// Infrastructure
export * from './infrastructure/index.ts';
