import * as fs from 'node:fs';
import * as path from 'node:path';
import { Dataset } from '../../src/models/Dataset';
import { DatasetLoadError } from '../../src/models/Errors';
import { parseDataset } from '../../src/services/DatasetService';

/**
 * Node counterpart of fetchDataset: read a CSV by path and parse it with the
 * same loader the dashboard uses.
 */
export function loadDatasetFile(filePath: string): Dataset {
  const resolved = path.resolve(filePath);

  let text: string;
  try {
    text = fs.readFileSync(resolved, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new DatasetLoadError(`The file ${filePath} was not found.`, filePath);
    }
    const reason = error instanceof Error ? error.message : String(error);
    throw new DatasetLoadError(`Could not read ${filePath}: ${reason}`, filePath);
  }

  return parseDataset(text, filePath);
}
