// Saving and loading entities through bundle files
//
// Defaults to the local filesystem and the JSON codec; tests pass the
// in-memory reader/writer instead.

import type { Id } from '@tessera/protocol';
import {
  createFilesystemReader,
  createFilesystemWriter,
  jsonCodec,
  type BundleReader,
  type BundleWriter,
  type SnapshotCodec,
} from '@tessera/store';
import { ValidationError } from '../errors.js';
import type { Entity, SnapshotOptions } from './entity.js';
import type { EntityClass } from './entity-class.js';

export type SaveOptions = SnapshotOptions & {
  writer?: BundleWriter;
  codec?: SnapshotCodec;
};

export type LoadOptions = {
  reader?: BundleReader;
  codec?: SnapshotCodec;
};

async function readDocument(filePath: string, options: LoadOptions): Promise<unknown> {
  const { reader = createFilesystemReader(), codec = jsonCodec } = options;
  const text = await reader.readFile(filePath);
  try {
    return codec.decode(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ValidationError(`Cannot decode ${filePath} as ${codec.name}: ${reason}`, {
      details: { filePath, codec: codec.name },
      cause: error,
    });
  }
}

async function writeDocument(filePath: string, document: unknown, options: SaveOptions): Promise<void> {
  const { writer = createFilesystemWriter(), codec = jsonCodec } = options;
  await writer.writeFile(filePath, codec.encode(document));
}

/**
 * Write one entity's snapshot to a file.
 *
 * @example
 * ```typescript
 * await saveEntity(user, 'out/user.json', { includeSchema: true });
 * ```
 */
export async function saveEntity(entity: Entity, filePath: string, options: SaveOptions = {}): Promise<void> {
  await writeDocument(filePath, entity.toSnapshot(options), options);
}

/**
 * Load one entity from a snapshot file.
 */
export async function loadEntity(
  entityClass: EntityClass,
  filePath: string,
  options: LoadOptions & { id?: Id } = {}
): Promise<Entity> {
  const document = await readDocument(filePath, options);
  return entityClass.fromSnapshot(document, { id: options.id });
}

/**
 * Write several entities of one class as a collection bundle.
 */
export async function saveCollection(
  entityClass: EntityClass,
  entities: readonly Entity[],
  filePath: string,
  options: SaveOptions = {}
): Promise<void> {
  await writeDocument(filePath, entityClass.toCollection(entities, options), options);
}

export async function loadCollection(
  entityClass: EntityClass,
  filePath: string,
  options: LoadOptions = {}
): Promise<Entity[]> {
  const document = await readDocument(filePath, options);
  return entityClass.fromCollection(document);
}
