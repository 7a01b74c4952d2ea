import { readFileSync } from 'fs';
import { FileReadError, ManifestParseError } from '../errors.js';
import { validatePath } from './validation.js';

const utf8 = new TextDecoder('utf-8', { fatal: true });

export function decodeManifest(bytes: Uint8Array): string {
  try {
    return utf8.decode(bytes);
  } catch {
    throw ManifestParseError.malformedXml('file is not valid UTF-8');
  }
}

/** Read a manifest from disk as strict UTF-8; a leading byte order mark is dropped. */
export function readManifestFile(path: string): string {
  validatePath(path);
  let bytes: Buffer;
  try {
    bytes = readFileSync(path);
  } catch (error) {
    throw FileReadError.fromFsError(error, path);
  }
  return decodeManifest(bytes);
}
