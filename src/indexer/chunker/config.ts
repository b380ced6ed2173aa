/**
 * Chunker Configuration
 *
 * Resolves the settings a chunker uses for an extension from the loaded
 * config: the `[extensions.<ext>]` override where present, the globals
 * otherwise.
 */

import type { Config } from '../../config/schema.js';
import { normalizeExtension } from '../../config/loader.js';
import type { ExtensionSettings } from './types.js';

export function resolveExtensionSettings(config: Readonly<Config>, extension: string): ExtensionSettings {
  const override = config.extensions[normalizeExtension(extension)] ?? {};

  return {
    maxChunkSize: override.max_chunk_size ?? config.chunk_size,
    chunkOverlap: override.chunk_overlap ?? config.chunk_overlap,
    preserveTypeBoundaries: override.preserve_type_boundaries ?? true,
    preserveFunctionBoundaries: override.preserve_function_boundaries ?? true,
    includeDocstrings: override.include_docstrings ?? true,
    maxTypeMembers: override.max_type_members,
  };
}

/**
 * Settings for the fallback chunker: the global window, overridden per
 * extension when one is configured.
 */
export function resolveFallbackWindow(
  config: Readonly<Config>,
  extension: string
): { chunkSize: number; chunkOverlap: number } {
  const override = extension === '' ? undefined : config.extensions[normalizeExtension(extension)];
  return {
    chunkSize: override?.max_chunk_size ?? config.chunk_size,
    chunkOverlap: override?.chunk_overlap ?? config.chunk_overlap,
  };
}
