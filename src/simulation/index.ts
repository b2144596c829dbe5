/**
 * Azure Blob File System Simulation
 *
 * In-process stand-in for the Blob service, used by tests.
 */

export type { SimulatedRequest, SimulatedFailure, InMemoryBlobServiceOptions } from './blob-service.js';
export { InMemoryBlobService } from './blob-service.js';
