import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { Ajv, type ValidateFunction } from 'ajv';
import addFormatsPlugin, { type FormatsPluginOptions } from 'ajv-formats';
import { ModelValidationError } from './errors.js';
import type { UnifiedCampaignModel } from './types/index.js';

const ajv = new Ajv({ allErrors: true, strict: false });
const addFormats = addFormatsPlugin as unknown as (
  ajv: Ajv,
  options?: FormatsPluginOptions
) => Ajv;
addFormats(ajv);

export const SCHEMA_FILES = {
  campaign: 'campaign.json',
  aces: 'campaign-aces.json',
  log: 'campaign-log.json',
  combatReport: 'combat-report.json',
  missionData: 'mission-data.json',
  personnel: 'personnel.json',
  annotations: 'annotations.json',
  model: 'unified-model.json'
} as const;

export type SchemaName = keyof typeof SCHEMA_FILES;

export type ShapeCheck = { valid: true } | { valid: false; details: string };

const validatorCache = new Map<string, Promise<ValidateFunction>>();

async function compileValidator (schemaPath: string): Promise<ValidateFunction> {
  const schema = JSON.parse(await readFile(schemaPath, 'utf8'));
  return ajv.compile(schema);
}

function loadValidator (schemaPath: string): Promise<ValidateFunction> {
  let pending = validatorCache.get(schemaPath);
  if (!pending) {
    pending = compileValidator(schemaPath).catch((error: unknown) => {
      validatorCache.delete(schemaPath);
      throw error;
    });
    validatorCache.set(schemaPath, pending);
  }
  return pending;
}

export async function checkShape (
  schemaDir: string,
  schema: SchemaName,
  data: unknown,
  label: string = schema
): Promise<ShapeCheck> {
  const validator = await loadValidator(join(schemaDir, SCHEMA_FILES[schema]));
  if (validator(data)) return { valid: true };
  return { valid: false, details: ajv.errorsText(validator.errors, { dataVar: label }) };
}

export async function validateModel (
  model: UnifiedCampaignModel,
  schemaDir: string
): Promise<void> {
  // Round-trip through JSON so the check sees exactly what collaborators receive.
  const serialized: unknown = JSON.parse(JSON.stringify(model));
  const result = await checkShape(schemaDir, 'model', serialized, 'model');
  if (!result.valid) {
    throw new ModelValidationError(result.details);
  }
}
