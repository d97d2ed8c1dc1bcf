/**
 * Streaming downloads.
 */

export type { ObjectReadSource } from "./object-read-source.js";
export { CONTINUE_STATUS, HttpObjectReadSource, ObjectReadErrorSource } from "./object-read-source.js";
export type { ObjectReadStreamOptions, ReadStreamState } from "./object-read-stream.js";
export { ObjectReadStream } from "./object-read-stream.js";
