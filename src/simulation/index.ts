/**
 * Simulation Layer
 *
 * In-process stand-ins for the storage service, used by tests and examples.
 */

export type { SimulatedStorageOptions } from "./storage-transport.js";
export { SIMULATED_ENDPOINT, SimulatedStorageTransport } from "./storage-transport.js";
export type { RecordedCall, RecordingUploadSessionOptions } from "./recording-session.js";
export { RecordingUploadSession } from "./recording-session.js";
