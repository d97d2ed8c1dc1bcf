/**
 * Services module re-exports.
 */

export { StreamingService } from "./streaming.js";
