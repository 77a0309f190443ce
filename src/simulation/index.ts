/**
 * Simulation module exports.
 * @module simulation
 */

export { MockTransport, staticConfig } from './mock-transport.js';
export type { RecordedRequest, ScriptedReply } from './mock-transport.js';
export { createMockClient } from './mock-client.js';
