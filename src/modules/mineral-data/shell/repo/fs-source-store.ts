/**
 * Source files on the local filesystem, one CSV per source inside the data
 * directory.
 */

import { constants } from 'node:fs';
import fs from 'node:fs/promises';
import path from 'node:path';

import { err, ok, type Result } from 'neverthrow';

import { writeFileAtomic } from '../../../../infra/fs/atomic-write.js';
import {
  createSourceMissingError,
  createSourceReadError,
  createSourceWriteError,
  type SourceAccessError,
  type SourceReadError,
  type SourceWriteError,
} from '../../core/errors.js';
import { SOURCE_FILES, type SourceName } from '../../core/types.js';

import type { SourceFileStore } from '../../core/ports.js';

export interface FsSourceStoreOptions {
  dataDir: string;
}

export const makeFsSourceStore = (options: FsSourceStoreOptions): SourceFileStore => {
  const pathOf = (source: SourceName): string => path.join(options.dataDir, SOURCE_FILES[source]);

  return {
    async read(source: SourceName): Promise<Result<string, SourceAccessError>> {
      const filePath = pathOf(source);
      try {
        return ok(await fs.readFile(filePath, 'utf8'));
      } catch (error) {
        const code = (error as NodeJS.ErrnoException).code;
        if (code === 'ENOENT') {
          return err(createSourceMissingError(source, SOURCE_FILES[source]));
        }
        return err(createSourceReadError(`Failed to read ${filePath}`, error));
      }
    },

    async write(source: SourceName, bytes: Uint8Array): Promise<Result<void, SourceWriteError>> {
      const filePath = pathOf(source);
      try {
        await writeFileAtomic(filePath, bytes);
        return ok(undefined);
      } catch (error) {
        return err(createSourceWriteError(source, `Failed to write ${filePath}`, error));
      }
    },

    async checkAccess(): Promise<Result<void, SourceReadError>> {
      try {
        await fs.access(options.dataDir, constants.R_OK);
        return ok(undefined);
      } catch (error) {
        return err(createSourceReadError(`Data directory ${options.dataDir} is not readable`, error));
      }
    },
  };
};
