// Legacy JSON-RPC request body (LMS-compatible control surfaces)
export * from './legacy-rpc';

// Outbound /ws frames
export * from './socket-messages';
