/**
 * Core module.
 * Reads the definition, builds the request and publishes it.
 * No CLI concerns live here.
 */

export * from './errors.js';
export { readDefinitionFile, inspectDefinition } from './definition.js';
export {
  splitApiIdentifier,
  mediaTypeFor,
  buildPublishUrl,
  buildPublishRequest,
  publishDefinition,
} from './publisher.js';
export type { ApiCoordinates, PublishInput, PublishOutcome } from './publisher.js';
