// Build, source stamp and worker records
export * from './build';

// Message formatting types
export * from './message';
