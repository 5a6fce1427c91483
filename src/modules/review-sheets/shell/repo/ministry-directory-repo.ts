import fs from 'node:fs/promises';

import { TypeCompiler } from '@sinclair/typebox/compiler';
import { err, ok, type Result } from 'neverthrow';

import { describeCause } from '../../../../common/types/errors.js';
import { createMinistryDirectoryError, type MinistryDirectoryError } from '../../core/errors.js';
import { createMinistryDirectory } from '../../core/ministries.js';
import { MinistryMasterSchema, type MinistryDirectory } from '../../core/types.js';

const validator = TypeCompiler.Compile(MinistryMasterSchema);

/**
 * Loads the ministry master (建制順 and historical aliases) from JSON.
 */
export const loadMinistryDirectory = async (
  filePath: string
): Promise<Result<MinistryDirectory, MinistryDirectoryError>> => {
  let parsed: unknown;

  try {
    parsed = JSON.parse(await fs.readFile(filePath, 'utf8'));
  } catch (error) {
    return err(
      createMinistryDirectoryError(
        filePath,
        `Failed to load ministry master at ${filePath}: ${describeCause(error)}`,
        [],
        error
      )
    );
  }

  if (!validator.Check(parsed)) {
    const details = [...validator.Errors(parsed)].map((e) => `${e.path}: ${e.message}`);
    return err(
      createMinistryDirectoryError(filePath, `Invalid ministry master at ${filePath}`, details)
    );
  }

  return ok(createMinistryDirectory(parsed));
};
