import { readFileSync } from 'node:fs';
import { extname } from 'node:path';
import { load } from 'js-yaml';
import { z } from 'zod';
import { ValidationError } from '@scenario-runner/domain';
import type { ScenarioConfig } from '@scenario-runner/domain';

const configDocumentSchema = z.record(z.unknown());

/** Reads a scenario config document from a .json, .yaml or .yml file. */
export function loadConfigFile(path: string): ScenarioConfig {
  const ext = extname(path).toLowerCase();

  let doc: unknown;
  switch (ext) {
    case '.json':
      doc = JSON.parse(readFileSync(path, 'utf8'));
      break;
    case '.yaml':
    case '.yml':
      doc = load(readFileSync(path, 'utf8'));
      break;
    default:
      throw new ValidationError(`unsupported config file format: ${ext || '(none)'}`);
  }

  const parsed = configDocumentSchema.safeParse(doc);
  if (!parsed.success) {
    throw new ValidationError(`config file ${path} must contain a mapping at the top level`);
  }
  return parsed.data;
}
