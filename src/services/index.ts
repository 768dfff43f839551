// Message formatters
export * from './message-formatter';

// Status text and context assembly
export * from './message/status-text';
export * from './message/context';

// Template loading and rendering
export * from './templates/template-store';
export * from './templates/message-renderer';
