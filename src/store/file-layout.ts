import * as path from 'node:path';

export const CONTACTS_DIR = 'contacts';
export const METADATA_DIR = '.metadata';

export function contactPath(storePath: string, id: string): string {
  return path.join(storePath, CONTACTS_DIR, `${id}.json`);
}

export function metadataPath(storePath: string, filename: string): string {
  return path.join(storePath, METADATA_DIR, filename);
}

export function relativeContactPath(id: string): string {
  return `${CONTACTS_DIR}/${id}.json`;
}
